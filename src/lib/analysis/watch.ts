import { AnalysisAbortedError, InputError, PriceFetchError, toLogObject } from '@/lib/errors';
import type { AnalysisResult, Analyzer } from './analyzer';

export type WatchOptions = {
  intervalMinutes: number;
  signal: AbortSignal;
  groupByWallet?: boolean;
  onResult?: (result: AnalysisResult) => void;
  onError?: (error: PriceFetchError) => void;
};

// setTimeout clamps anything above this to 1 ms
export const MAX_TIMER_MS = 2_147_483_647;

/** Resolves after `ms`, or early once `signal` aborts. Long waits are split into timer-sized steps. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    function arm() {
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      timer = setTimeout(remaining > 0 ? arm : done, step);
    }
    signal.addEventListener('abort', done, { once: true });
    arm();
  });
}

/**
 * Repeats the analysis every `intervalMinutes` until `signal` aborts.
 *
 * Each run is atomic, so stopping between runs is always safe; a stop during a
 * run aborts it before history is written. A failed price fetch skips that run
 * and the loop carries on. Any other error ends the loop.
 *
 * @returns the number of completed runs
 */
export async function watchAnalysis(analyzer: Analyzer, opts: WatchOptions): Promise<number> {
  if (!Number.isFinite(opts.intervalMinutes) || opts.intervalMinutes <= 0) {
    throw new InputError(`Invalid interval: ${opts.intervalMinutes}`, { intervalMinutes: ['must be greater than 0'] });
  }
  const intervalMs = opts.intervalMinutes * 60_000;
  let completed = 0;

  while (!opts.signal.aborted) {
    try {
      const result = await analyzer.run({ groupByWallet: opts.groupByWallet, signal: opts.signal });
      completed += 1;
      opts.onResult?.(result);
    } catch (error) {
      if (error instanceof AnalysisAbortedError) break;
      if (!(error instanceof PriceFetchError)) throw error;
      console.error('[Analysis] Run skipped:', toLogObject(error));
      opts.onError?.(error);
    }
    await sleep(intervalMs, opts.signal);
  }

  console.log(`[Analysis] Repeat mode stopped after ${completed} run(s)`);
  return completed;
}
