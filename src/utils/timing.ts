/**
 * Timing utilities
 * Elapsed-time measurement for log lines
 */

import { performance } from 'perf_hooks';

export class Timer {
  private readonly label: string;
  private readonly start: number;

  constructor(label: string) {
    this.label = label;
    this.start = performance.now();
  }

  elapsed(): number {
    return performance.now() - this.start;
  }

  format(): string {
    return `${this.label}: ${this.elapsed().toFixed(2)}ms`;
  }
}
