/**
 * Node timer adapter
 *
 * Implements the TimerAPI contract on top of setTimeout/setInterval so the
 * logger sinks and the control loop never touch Node timers directly.
 */

import type { TimerAPI } from '$types/common';

/**
 * Create a TimerAPI backed by Node timers
 *
 * Handles are small integers mapped to the underlying Timeout objects.
 * Timers are unref'd when `unref` is set so background work (console drain,
 * Slack retries) never keeps the process alive on its own.
 *
 * @param options - Adapter options
 * @returns TimerAPI implementation
 */
export function createNodeTimer(options?: { unref?: boolean }): TimerAPI {
  const handles = new Map<number, NodeJS.Timeout>();
  const unref = options !== undefined && options.unref === true;
  let nextId = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    const id = nextId++;
    let handle: NodeJS.Timeout;

    if (repeat) {
      handle = setInterval(callback, intervalMs);
    } else {
      handle = setTimeout(function() {
        handles.delete(id);
        callback();
      }, intervalMs);
    }

    if (unref) {
      handle.unref();
    }
    handles.set(id, handle);
    return id;
  }

  function clear(id: number): void {
    const handle = handles.get(id);
    if (handle === undefined) {
      return;
    }
    clearTimeout(handle);
    clearInterval(handle);
    handles.delete(id);
  }

  return {
    set: set,
    clear: clear
  };
}
