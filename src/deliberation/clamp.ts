import { Direction, FinalOrder, OrderAction, PriceBand, Proposal } from '../core/types';
import { roundPrice } from '../market/priceLimits';
import { DeliberationContext } from './context';

export const BOARD_LOT = 100;

export interface ClampLimits {
  observationOnly: boolean;
  band: PriceBand | null;
  precision: number;
  tradableShares: number;
  buyingPower: number;
  referencePrice: number | null;
}

export const limitsFromContext = (ctx: DeliberationContext): ClampLimits => ({
  observationOnly: ctx.observationOnly,
  band: ctx.band.available ? ctx.band.band : null,
  precision: ctx.instrument.precision,
  tradableShares: ctx.exposure.tradableShares,
  buyingPower: ctx.exposure.buyingPower,
  referencePrice: ctx.referencePrice
});

interface RawAction {
  action: OrderAction;
  quantity: number;
  limitPrice: number | null;
  stopLoss: number | null;
}

interface ClampedAction extends RawAction {
  adjustments: string[];
}

const clampPrice = (label: string, value: number | null, limits: ClampLimits, adjustments: string[]): number | null => {
  if (value === null) return null;
  if (!limits.band) return null;
  const { limitDown, limitUp } = limits.band;
  let price = roundPrice(value, limits.precision);
  if (price < limitDown) {
    adjustments.push(`${label} ${value} raised to limit-down ${limitDown}`);
    price = limitDown;
  } else if (price > limitUp) {
    adjustments.push(`${label} ${value} lowered to limit-up ${limitUp}`);
    price = limitUp;
  } else if (price !== value) {
    adjustments.push(`${label} ${value} rounded to ${price}`);
  }
  return price;
};

/**
 * Brings an agent's action inside what the desk can actually do: sells within the tradable
 * tranche, buys within buying power in whole board lots, prices inside the band on the tick grid.
 * Without a band nothing is actionable.
 */
const clampAction = (raw: RawAction, limits: ClampLimits, passive: 'hold' | 'abstain'): ClampedAction => {
  const adjustments: string[] = [];
  const active = raw.action === 'buy' || raw.action === 'sell';

  if (limits.observationOnly || !limits.band) {
    if (active || raw.quantity > 0 || raw.limitPrice !== null || raw.stopLoss !== null) {
      adjustments.push(`observation-only run: ${raw.action} ${raw.quantity} replaced by ${active ? passive : raw.action}`);
    }
    return { action: active ? passive : raw.action, quantity: 0, limitPrice: null, stopLoss: null, adjustments };
  }

  let quantity = Number.isFinite(raw.quantity) ? Math.max(0, Math.floor(raw.quantity)) : 0;
  if (quantity !== raw.quantity) {
    adjustments.push(`quantity ${raw.quantity} truncated to ${quantity}`);
  }
  let limitPrice = clampPrice('limit price', raw.limitPrice, limits, adjustments);
  const stopLoss = clampPrice('stop loss', raw.stopLoss, limits, adjustments);

  if (!active) {
    if (quantity > 0) adjustments.push(`${raw.action} carries no quantity; ${quantity} dropped`);
    return { action: raw.action, quantity: 0, limitPrice: null, stopLoss, adjustments };
  }

  if (limitPrice === null && limits.referencePrice !== null) {
    limitPrice = clampPrice('reference price', limits.referencePrice, limits, []);
    adjustments.push(`missing limit price set to reference ${limitPrice}`);
  }

  if (raw.action === 'sell' && quantity > limits.tradableShares) {
    adjustments.push(`sell ${quantity} clamped to tradable ${limits.tradableShares} (base tranche is locked)`);
    quantity = limits.tradableShares;
  }

  if (raw.action === 'buy') {
    const lots = Math.floor(quantity / BOARD_LOT) * BOARD_LOT;
    if (lots !== quantity) {
      adjustments.push(`buy ${quantity} rounded down to ${lots} (board lot ${BOARD_LOT})`);
      quantity = lots;
    }
    const price = limitPrice ?? 0;
    const affordable = price > 0 ? Math.floor(limits.buyingPower / price / BOARD_LOT) * BOARD_LOT : 0;
    if (quantity > affordable) {
      adjustments.push(`buy ${quantity} clamped to ${affordable} by buying power ${limits.buyingPower.toFixed(2)}`);
      quantity = affordable;
    }
  }

  if (quantity === 0) {
    adjustments.push(`${raw.action} reduced to nothing; replaced by ${passive}`);
    return { action: passive, quantity: 0, limitPrice: null, stopLoss, adjustments };
  }
  return { action: raw.action, quantity, limitPrice, stopLoss, adjustments };
};

const asDirection = (action: OrderAction): Direction => (action === 'abstain' ? 'hold' : action);

export type ProposalInput = Omit<Proposal, 'adjustments'>;

export const clampProposal = (proposal: ProposalInput, limits: ClampLimits): Proposal => {
  const clamped = clampAction(
    { action: proposal.direction, quantity: proposal.quantity, limitPrice: proposal.limitPrice, stopLoss: proposal.stopLoss },
    limits,
    'hold'
  );
  return {
    direction: asDirection(clamped.action),
    quantity: clamped.quantity,
    limitPrice: clamped.limitPrice,
    stopLoss: clamped.stopLoss,
    commentary: proposal.commentary,
    adjustments: clamped.adjustments
  };
};

export type FinalOrderInput = Omit<FinalOrder, 'adjustments'>;

export const clampFinalOrder = (order: FinalOrderInput, limits: ClampLimits): FinalOrder => {
  const clamped = clampAction(
    { action: order.action, quantity: order.quantity, limitPrice: order.limitPrice, stopLoss: null },
    limits,
    'abstain'
  );
  return {
    action: clamped.action,
    quantity: clamped.quantity,
    limitPrice: clamped.limitPrice,
    commentary: order.commentary,
    adjustments: clamped.adjustments
  };
};
