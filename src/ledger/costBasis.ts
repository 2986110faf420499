import Decimal from 'decimal.js';
import { Position, TradeEvent } from '../core/types';
import { LedgerInvariantViolation } from '../core/errors';
import { parseTimestamp } from '../core/time';
import { roundPrice } from '../market/priceLimits';

// Display precision only; the fold keeps full precision.
export const COST_PRECISION = 4;

export interface PositionSettings {
  baseShares: number;
  capitalAllocation: number;
}

export const emptyPosition = (symbol: string, settings?: Partial<PositionSettings>): Position => ({
  symbol,
  shares: 0,
  baseShares: settings?.baseShares ?? 0,
  costBasis: 0,
  averageCost: 0,
  realizedPnl: 0,
  capitalAllocation: settings?.capitalAllocation ?? 0,
  updatedAt: new Date(0).toISOString()
});

export const tradableShares = (position: Position): number => Math.max(0, position.shares - position.baseShares);

export const displayCost = (value: number): number => roundPrice(value, COST_PRECISION);

/** Shape checks that do not depend on position state. */
export const validateTradeEvent = (event: TradeEvent) => {
  const { symbol, side, quantity, price } = event;
  if (!Number.isInteger(quantity)) {
    throw new LedgerInvariantViolation(symbol, 'invalid_quantity', `quantity must be a whole number of shares, got ${quantity}`);
  }
  if (side === 'override') {
    if (quantity < 0) {
      throw new LedgerInvariantViolation(symbol, 'invalid_quantity', `override quantity must be >= 0, got ${quantity}`);
    }
    if (!Number.isFinite(price) || price < 0 || (quantity > 0 && price === 0)) {
      throw new LedgerInvariantViolation(symbol, 'invalid_price', `override price must be positive, got ${price}`);
    }
  } else {
    if (quantity <= 0) {
      throw new LedgerInvariantViolation(symbol, 'invalid_quantity', `${side} quantity must be > 0, got ${quantity}`);
    }
    if (!Number.isFinite(price) || price <= 0) {
      throw new LedgerInvariantViolation(symbol, 'invalid_price', `${side} price must be > 0, got ${price}`);
    }
  }
  parseTimestamp(event.timestamp);
};

export interface ApplyOptions {
  /** Check the locked base tranche. Replays only enforce it for the event being inserted. */
  enforceBase?: boolean;
}

/**
 * Folds one event into a position. Buys move both costs to the weighted average. Sells apply the
 * verified-cost rule to `costBasis`: the remaining shares absorb the realised gain or loss, so the
 * basis may fall to zero or below. `averageCost` is left alone by sells and feeds realised P&L.
 */
export const applyEvent = (position: Position, event: TradeEvent, options: ApplyOptions = {}): Position => {
  validateTradeEvent(event);
  const enforceBase = options.enforceBase ?? true;
  const { shares } = position;
  const { quantity } = event;
  const costBasis = new Decimal(position.costBasis);
  const averageCost = new Decimal(position.averageCost);
  const price = new Decimal(event.price);

  switch (event.side) {
    case 'buy': {
      const total = shares + quantity;
      return {
        ...position,
        shares: total,
        costBasis: costBasis.times(shares).plus(price.times(quantity)).dividedBy(total).toNumber(),
        averageCost: averageCost.times(shares).plus(price.times(quantity)).dividedBy(total).toNumber(),
        updatedAt: event.timestamp
      };
    }
    case 'sell': {
      if (quantity > shares) {
        throw new LedgerInvariantViolation(event.symbol, 'insufficient_shares', `sell ${quantity} exceeds held ${shares}`);
      }
      if (enforceBase && quantity > shares - position.baseShares) {
        throw new LedgerInvariantViolation(
          event.symbol,
          'locked_tranche',
          `locked-tranche violation: sell ${quantity} exceeds tradable ${tradableShares(position)} (base ${position.baseShares})`
        );
      }
      const remaining = shares - quantity;
      return {
        ...position,
        shares: remaining,
        costBasis: remaining > 0 ? costBasis.times(shares).minus(price.times(quantity)).dividedBy(remaining).toNumber() : 0,
        averageCost: remaining > 0 ? position.averageCost : 0,
        realizedPnl: price.minus(averageCost).times(quantity).plus(position.realizedPnl).toNumber(),
        updatedAt: event.timestamp
      };
    }
    case 'override': {
      if (enforceBase && quantity < position.baseShares) {
        throw new LedgerInvariantViolation(
          event.symbol,
          'base_exceeds_shares',
          `override to ${quantity} shares is below the locked base of ${position.baseShares}`
        );
      }
      const cost = quantity > 0 ? event.price : 0;
      return { ...position, shares: quantity, costBasis: cost, averageCost: cost, updatedAt: event.timestamp };
    }
    default: {
      const unknownSide: never = event.side;
      throw new LedgerInvariantViolation(event.symbol, 'invalid_quantity', `unknown trade side ${String(unknownSide)}`);
    }
  }
};

/** Stable chronological order: timestamp, then original append order. */
export const sortEvents = (events: TradeEvent[]): TradeEvent[] =>
  events
    .map((event, idx) => ({ event, idx, ts: parseTimestamp(event.timestamp) }))
    .sort((a, b) => a.ts - b.ts || a.idx - b.idx)
    .map((entry) => entry.event);
