import { BacktestScore, DecisionRecord } from '../core/types';
import { createLogger } from '../core/logger';
import { PersistenceStore } from '../ledger/storage';

const log = createLogger('strategy-log');

/**
 * Append-only record of every terminal deliberation. Records are never rewritten; a backtest score
 * is stored as its own entry and merged on read (the latest score per record wins).
 */
export class StrategyLog {
  private store: PersistenceStore;

  constructor(store: PersistenceStore) {
    this.store = store;
  }

  append(record: DecisionRecord): void {
    if (this.store.readDecisions().some((r) => r.id === record.id)) {
      throw new Error(`Decision ${record.id} is already logged`);
    }
    this.store.appendDecision(record);
    log.info('Decision logged', { id: record.id, symbol: record.symbol, status: record.status });
  }

  list(symbol?: string): DecisionRecord[] {
    const scores = new Map<string, BacktestScore>();
    for (const entry of this.store.readDecisionScores()) {
      scores.set(entry.id, entry.score);
    }
    return this.store
      .readDecisions()
      .filter((r) => !symbol || r.symbol === symbol)
      .map((r) => {
        const score = scores.get(r.id);
        return score ? { ...r, backtestScore: score } : r;
      })
      .sort((a, b) => new Date(a.createdAt).getTime() - new Date(b.createdAt).getTime());
  }

  get(id: string): DecisionRecord | undefined {
    return this.list().find((r) => r.id === id);
  }

  latest(symbol: string): DecisionRecord | undefined {
    const records = this.list(symbol);
    return records.length ? records[records.length - 1] : undefined;
  }

  attachScore(id: string, score: BacktestScore): DecisionRecord {
    const record = this.get(id);
    if (!record) {
      throw new Error(`Decision ${id} not found`);
    }
    this.store.appendDecisionScore({ id, score });
    return { ...record, backtestScore: score };
  }
}
