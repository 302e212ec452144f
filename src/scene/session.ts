/**
 * Scoped read-session access
 */

import { TransformFailureError } from '../errors.js';
import { getLogger } from '../utils/debug.js';
import type { ReadSession, SceneStore } from './types.js';

/**
 * Where clip geometry may be read from
 * A caller session is borrowed; otherwise one is opened on the store for the call.
 */
export interface SceneAccess {
  store?: SceneStore;
  session?: ReadSession;
}

/**
 * Run `work` against a read session
 *
 * A borrowed session is handed through untouched. An owned session is opened
 * on the store and closed on every exit path. When `work` throws, a failing
 * close is logged and the error from `work` is rethrown.
 */
export function withReadSession<T>(access: SceneAccess, work: (session: ReadSession) => T): T {
  if (access.session) {
    return work(access.session);
  }

  if (!access.store) {
    throw new TransformFailureError('No scene store or read session available to read clip geometry');
  }

  const owned = access.store.openReadSession();
  let result: T;
  try {
    result = work(owned);
  } catch (err) {
    try {
      owned.close();
    } catch (closeErr) {
      getLogger().warn('Failed to close read session after a read error', closeErr);
    }
    throw err;
  }
  owned.close();
  return result;
}
