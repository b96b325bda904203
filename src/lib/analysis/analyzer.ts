import type { AggregateRow, Alert, HistoryEntry } from '@/lib/types';
import type { AppConfig } from '@/lib/config';
import type { LotStore } from '@/lib/lots/store';
import type { HistoryLog } from '@/lib/history/log';
import type { PriceProvider } from '@/lib/prices/providers';
import { aggregate } from '@/lib/portfolio/aggregate';
import { summarizeAggregates, type AnalysisSummary } from '@/lib/portfolio/summary';
import { evaluateAlerts } from '@/lib/alerts/evaluate';
import { AnalysisAbortedError, AnalysisInProgressError } from '@/lib/errors';

export type AnalysisResult = {
  timestamp: string;
  groupByWallet: boolean;
  rows: AggregateRow[];
  alerts: Alert[];
  summary: AnalysisSummary;
  history: HistoryEntry[];
};

export type RunOptions = {
  groupByWallet?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
};

export type AnalyzerDeps = {
  lots: LotStore;
  history: HistoryLog;
  provider: PriceProvider;
  config: Pick<AppConfig, 'alerts' | 'precision'>;
};

/**
 * One analysis run: load lots, fetch prices once, aggregate, append the snapshot, scan for alerts.
 * Only one run per instance may be in flight.
 */
export class Analyzer {
  private running = false;

  constructor(private readonly deps: AnalyzerDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  async run(opts: RunOptions = {}): Promise<AnalysisResult> {
    if (this.running) throw new AnalysisInProgressError();
    this.running = true;
    try {
      return await this.runOnce(opts);
    } finally {
      this.running = false;
    }
  }

  private async runOnce(opts: RunOptions): Promise<AnalysisResult> {
    const { lots, history, provider, config } = this.deps;
    const groupByWallet = opts.groupByWallet ?? false;
    const now = opts.now ?? (() => new Date());

    if (opts.signal?.aborted) throw new AnalysisAbortedError();
    const allLots = lots.listLots();
    let rows: AggregateRow[];
    try {
      rows = await aggregate(allLots, provider, {
        groupByWallet,
        precision: config.precision,
        signal: opts.signal,
      });
    } catch (error) {
      // a cancelled price request surfaces as a fetch failure
      if (opts.signal?.aborted) throw new AnalysisAbortedError();
      throw error;
    }
    // last exit before anything is written
    if (opts.signal?.aborted) throw new AnalysisAbortedError();

    const at = now();
    const entries = history.appendSnapshot(rows, { now: at });
    const alerts = evaluateAlerts(rows, config.alerts);
    if (alerts.length) console.log(`[Analysis] ${alerts.length} alert(s) on ${config.alerts.riskCategory} coins`);

    return {
      timestamp: at.toISOString(),
      groupByWallet,
      rows,
      alerts,
      summary: summarizeAggregates(rows, config.precision),
      history: entries,
    };
  }
}
