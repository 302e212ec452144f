/**
 * Footprint Plan Renderer
 *
 * Renders footprints (X/Y only) and optional marker points to an SVG string
 * for visual debugging. World Y points up, so Y is flipped on output.
 */

import type { Vec2 } from '../geometry/types.js';

/**
 * Render options
 */
export interface RenderFootprintOptions {
  /** Canvas width */
  width: number;
  /** Canvas height */
  height: number;
  /** Stroke color for footprint outlines */
  strokeColor?: string;
  /** Stroke width for footprint outlines */
  strokeWidth?: number;
  /** Background color */
  backgroundColor?: string;
  /** Center and scale to fit */
  fitToView?: boolean;
  /** Points to mark (e.g. annotation locations) */
  markers?: readonly Vec2[];
  /** Marker radius in pixels */
  markerRadius?: number;
  /** Marker fill color */
  markerColor?: string;
}

const PADDING = 50;

function fmt(value: number): string {
  return value.toFixed(2);
}

/**
 * Render footprints to SVG string
 *
 * @param footprints - Polygons to outline, one closed path each
 * @param options - Render options
 * @returns SVG string
 */
export function renderFootprintsToSVG(
  footprints: readonly (readonly Vec2[])[],
  options: RenderFootprintOptions
): string {
  const {
    width,
    height,
    strokeColor = '#1a1a1a',
    strokeWidth = 1.5,
    backgroundColor = '#ffffff',
    fitToView = true,
    markers = [],
    markerRadius = 3,
    markerColor = '#d62828'
  } = options;

  let scale = 1.0;
  let offsetX = 0;
  let offsetY = 0;

  const allPoints = [...footprints.flat(), ...markers];
  if (fitToView && allPoints.length > 0) {
    const xs = allPoints.map(p => p.x);
    const ys = allPoints.map(p => p.y);
    const minX = Math.min(...xs);
    const maxX = Math.max(...xs);
    const minY = Math.min(...ys);
    const maxY = Math.max(...ys);

    const boundsWidth = maxX - minX;
    const boundsHeight = maxY - minY;
    if (boundsWidth > 0 && boundsHeight > 0) {
      scale = Math.min((width - PADDING * 2) / boundsWidth, (height - PADDING * 2) / boundsHeight);
    }

    offsetX = width / 2 - ((minX + maxX) / 2) * scale;
    offsetY = height / 2 - ((minY + maxY) / 2) * scale;
  }

  const toScreen = (p: Vec2): [number, number] => [p.x * scale + offsetX, height - (p.y * scale + offsetY)];

  const paths: string[] = [];
  for (const footprint of footprints) {
    if (footprint.length < 2) continue;

    const commands = footprint.map((p, i) => {
      const [sx, sy] = toScreen(p);
      return `${i === 0 ? 'M' : 'L'} ${fmt(sx)} ${fmt(sy)}`;
    });
    paths.push(
      `  <path d="${commands.join(' ')} Z" fill="none" stroke="${strokeColor}" stroke-width="${strokeWidth}" stroke-linejoin="miter"/>`
    );
  }

  const circles = markers.map(marker => {
    const [sx, sy] = toScreen(marker);
    return `  <circle cx="${fmt(sx)}" cy="${fmt(sy)}" r="${markerRadius}" fill="${markerColor}"/>`;
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="100%" height="100%" fill="${backgroundColor}"/>`,
    ...paths,
    ...circles,
    '</svg>'
  ].join('\n');
}
