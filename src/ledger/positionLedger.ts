import { LedgerCheckpoint, Position, TradeEvent, TradeSide } from '../core/types';
import { LedgerInvariantViolation } from '../core/errors';
import { KeyedMutex } from '../core/lock';
import { createLogger } from '../core/logger';
import { parseTimestamp } from '../core/time';
import { makeId } from '../core/utils';
import { normalizeSymbol } from '../market/instrument';
import { PositionSettings, applyEvent, emptyPosition, sortEvents, tradableShares } from './costBasis';
import { PersistenceStore } from './storage';

const log = createLogger('ledger');

export interface TradeInput {
  symbol: string;
  side: TradeSide;
  quantity: number;
  price: number;
  timestamp?: string;
  note?: string;
  id?: string;
}

export interface PositionLedgerOptions {
  store: PersistenceStore;
  checkpointInterval?: number;
  /** Used when an allocation was never set. */
  fallbackCapital?: number;
  clock?: () => Date;
  mutex?: KeyedMutex;
}

export interface PositionExposure {
  position: Position;
  tradableShares: number;
  effectiveLimit: number;
  buyingPower: number;
}

interface ReplayResult {
  position: Position;
  checkpoints: LedgerCheckpoint[];
}

const settingsOf = (position: Position): PositionSettings => ({
  baseShares: position.baseShares,
  capitalAllocation: position.capitalAllocation
});

/**
 * Source of truth for share counts, the locked base tranche, cost basis and the capital ceiling.
 * Positions are derived from an append-only trade log; mutations run under a per-symbol lock and
 * the stored snapshot is replaced only after a full replay succeeds.
 */
export class PositionLedger {
  private store: PersistenceStore;
  private checkpointInterval: number;
  private fallbackCapital: number;
  private clock: () => Date;
  private mutex: KeyedMutex;

  constructor(options: PositionLedgerOptions) {
    this.store = options.store;
    this.checkpointInterval = options.checkpointInterval ?? 20;
    this.fallbackCapital = options.fallbackCapital ?? 0;
    this.clock = options.clock ?? (() => new Date());
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  getPosition(symbol: string): Position {
    const code = normalizeSymbol(symbol);
    return this.store.loadPosition(code) ?? emptyPosition(code);
  }

  listPositions(): Position[] {
    return this.store.listPositions().sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  history(symbol: string): TradeEvent[] {
    return sortEvents(this.store.readTrades(normalizeSymbol(symbol)));
  }

  async applyTrade(input: TradeInput): Promise<Position> {
    const symbol = normalizeSymbol(input.symbol);
    return this.mutex.withLock(symbol, () => {
      const event: TradeEvent = {
        id: input.id ?? makeId('trd'),
        symbol,
        timestamp: input.timestamp ?? this.clock().toISOString(),
        side: input.side,
        quantity: input.quantity,
        price: input.price,
        ...(input.note ? { note: input.note } : {})
      };
      const eventTs = parseTimestamp(event.timestamp);
      const current = this.getPosition(symbol);
      const existing = this.history(symbol);
      // ties keep arrival order, so the new event lands after every event with the same timestamp
      const insertAt = existing.filter((e) => parseTimestamp(e.timestamp) <= eventTs).length;
      const backdated = insertAt < existing.length;
      const events = [...existing.slice(0, insertAt), event, ...existing.slice(insertAt)];

      const kept = this.store
        .loadCheckpoints(symbol)
        .filter((cp) => cp.seq <= insertAt)
        .sort((a, b) => a.seq - b.seq);
      const start = kept.length ? kept[kept.length - 1] : undefined;
      if (backdated) {
        log.info('Backdated trade; replaying', { symbol, insertAt, fromSeq: start?.seq ?? 0, total: events.length });
      }

      const result = this.replay(symbol, events, start, settingsOf(current), event.id);
      if (result.position.shares < result.position.baseShares) {
        throw new LedgerInvariantViolation(
          symbol,
          'locked_tranche',
          `locked-tranche violation: replay leaves ${result.position.shares} shares below base ${result.position.baseShares}`
        );
      }

      this.store.appendTrade(event);
      this.store.saveCheckpoints(symbol, [...kept, ...result.checkpoints]);
      this.store.savePosition(result.position);
      log.info('Trade applied', {
        symbol,
        side: event.side,
        quantity: event.quantity,
        price: event.price,
        shares: result.position.shares,
        costBasis: result.position.costBasis
      });
      return result.position;
    });
  }

  async setBaseShares(symbol: string, baseShares: number): Promise<Position> {
    const code = normalizeSymbol(symbol);
    return this.mutex.withLock(code, () => {
      const current = this.getPosition(code);
      if (!Number.isInteger(baseShares) || baseShares < 0) {
        throw new LedgerInvariantViolation(code, 'invalid_quantity', `base shares must be a non-negative integer, got ${baseShares}`);
      }
      if (baseShares > current.shares) {
        throw new LedgerInvariantViolation(code, 'base_exceeds_shares', `base ${baseShares} exceeds held ${current.shares}`);
      }
      const next: Position = { ...current, baseShares, updatedAt: this.clock().toISOString() };
      this.store.savePosition(next);
      log.info('Base tranche set', { symbol: code, baseShares });
      return next;
    });
  }

  async setCapitalAllocation(symbol: string, amount: number): Promise<Position> {
    const code = normalizeSymbol(symbol);
    return this.mutex.withLock(code, () => {
      if (!Number.isFinite(amount) || amount < 0) {
        throw new LedgerInvariantViolation(code, 'invalid_amount', `capital allocation must be >= 0, got ${amount}`);
      }
      const next: Position = { ...this.getPosition(code), capitalAllocation: amount, updatedAt: this.clock().toISOString() };
      this.store.savePosition(next);
      log.info('Capital allocation set', { symbol: code, amount });
      return next;
    });
  }

  /** Position as of `timestamp`, replayed from the nearest checkpoint at or before it. */
  snapshotAt(symbol: string, timestamp: string): Position {
    const code = normalizeSymbol(symbol);
    const cutoff = parseTimestamp(timestamp);
    const events = this.history(code).filter((e) => parseTimestamp(e.timestamp) <= cutoff);
    const start = this.store
      .loadCheckpoints(code)
      .filter((cp) => cp.seq <= events.length && parseTimestamp(cp.timestamp) <= cutoff)
      .sort((a, b) => a.seq - b.seq)
      .pop();
    const settings = settingsOf(this.getPosition(code));
    const result = this.replay(code, events, start, settings, null);
    return result.position;
  }

  tradableShares(symbol: string): number {
    return tradableShares(this.getPosition(symbol));
  }

  /** Allocation plus realised P&L: profits enlarge the ceiling, losses shrink it. */
  effectiveLimit(symbol: string): number {
    return this.limitOf(this.getPosition(symbol));
  }

  buyingPower(symbol: string, referencePrice: number): number {
    return this.buyingPowerOf(this.getPosition(symbol), referencePrice);
  }

  /** Snapshot at `timestamp` with the capital figures derived from that same snapshot. */
  exposureAt(symbol: string, timestamp: string, referencePrice: number | null): PositionExposure {
    const position = this.snapshotAt(symbol, timestamp);
    return {
      position,
      tradableShares: tradableShares(position),
      effectiveLimit: this.limitOf(position),
      buyingPower: referencePrice === null ? 0 : this.buyingPowerOf(position, referencePrice)
    };
  }

  private limitOf(position: Position): number {
    const allocation = position.capitalAllocation > 0 ? position.capitalAllocation : this.fallbackCapital;
    return allocation + position.realizedPnl;
  }

  private buyingPowerOf(position: Position, referencePrice: number): number {
    return Math.max(0, this.limitOf(position) - position.shares * referencePrice);
  }

  private replay(
    symbol: string,
    events: TradeEvent[],
    start: LedgerCheckpoint | undefined,
    settings: PositionSettings,
    insertedId: string | null
  ): ReplayResult {
    let position: Position = start ? { ...start.state, ...settings } : emptyPosition(symbol, settings);
    const checkpoints: LedgerCheckpoint[] = [];
    for (let seq = start?.seq ?? 0; seq < events.length; seq++) {
      const event = events[seq];
      position = applyEvent(position, event, { enforceBase: event.id === insertedId });
      const folded = seq + 1;
      if (event.side === 'override' || folded % this.checkpointInterval === 0) {
        checkpoints.push({ symbol, seq: folded, timestamp: event.timestamp, state: position });
      }
    }
    return { position, checkpoints };
  }
}
