/**
 * Engagement loop
 *
 * Keeps the user company while synthesis runs: samples the task on a fixed
 * interval and speaks at most `maxFillers` distinct fillers at the first
 * sampling points where it is still pending.
 */

import { sleep } from "../utils/async.js";

export interface EngagementLoopOptions {
  intervalMs: number;
  ceilingMs: number;
  maxFillers: number;
  fillers: readonly string[];
  /** Shared with the synthesis task; aborted on settle, timeout and close */
  signal: AbortSignal;
  isSettled: () => boolean;
  speak: (text: string) => Promise<unknown>;
}

/**
 * Run the loop until the task settles, the ceiling passes or the fillers run
 * out.
 *
 * @returns the number of fillers spoken
 */
export async function runEngagementLoop(options: EngagementLoopOptions): Promise<number> {
  const limit = Math.min(options.maxFillers, options.fillers.length);
  let spoken = 0;
  let elapsed = 0;

  while (spoken < limit && elapsed + options.intervalMs <= options.ceilingMs) {
    await sleep(options.intervalMs, options.signal);
    elapsed += options.intervalMs;

    if (options.signal.aborted || options.isSettled()) {
      break;
    }

    const filler = options.fillers[spoken];
    if (filler === undefined) break;
    spoken++;
    await options.speak(filler);
  }

  return spoken;
}
