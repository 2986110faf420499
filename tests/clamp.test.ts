import { PriceBand } from '../src/core/types';
import { ClampLimits, clampFinalOrder, clampProposal } from '../src/deliberation/clamp';

const band: PriceBand = {
  symbol: '600000',
  limitUp: 11,
  limitDown: 9,
  anchorPrice: 10,
  anchorDate: '2025-02-28',
  targetDate: '2025-03-03',
  bandPct: 0.1,
  precision: 2
};

const limits: ClampLimits = {
  observationOnly: false,
  band,
  precision: 2,
  tradableShares: 80,
  buyingPower: 5000,
  referencePrice: 10
};

const proposal = (direction: 'buy' | 'sell' | 'hold', quantity: number, limitPrice: number | null, stopLoss: number | null = null) => ({
  direction,
  quantity,
  limitPrice,
  stopLoss,
  commentary: 'test'
});

describe('clampProposal', () => {
  it('keeps sells inside the tradable tranche', () => {
    const out = clampProposal(proposal('sell', 200, 10.5, 9.5), limits);
    expect(out).toEqual({
      direction: 'sell',
      quantity: 80,
      limitPrice: 10.5,
      stopLoss: 9.5,
      commentary: 'test',
      adjustments: ['sell 200 clamped to tradable 80 (base tranche is locked)']
    });
  });

  it('limits buys by buying power in whole lots', () => {
    expect(clampProposal(proposal('buy', 1000, 10), limits)).toMatchObject({
      quantity: 500,
      adjustments: ['buy 1000 clamped to 500 by buying power 5000.00']
    });
    expect(clampProposal(proposal('buy', 250, 10), limits)).toMatchObject({
      quantity: 200,
      adjustments: ['buy 250 rounded down to 200 (board lot 100)']
    });
  });

  it('pulls prices onto the band and tick grid', () => {
    expect(clampProposal(proposal('buy', 1000, 12), limits)).toMatchObject({
      quantity: 400,
      limitPrice: 11,
      adjustments: ['limit price 12 lowered to limit-up 11', 'buy 1000 clamped to 400 by buying power 5000.00']
    });
    expect(clampProposal(proposal('buy', 100, 10.123, 8.5), limits)).toMatchObject({
      limitPrice: 10.12,
      stopLoss: 9,
      adjustments: ['limit price 10.123 rounded to 10.12', 'stop loss 8.5 raised to limit-down 9']
    });
  });

  it('fills a missing limit from the reference price', () => {
    expect(clampProposal(proposal('buy', 100, null), limits)).toMatchObject({
      quantity: 100,
      limitPrice: 10,
      adjustments: ['missing limit price set to reference 10']
    });
  });

  it('turns an order clamped to zero into a hold', () => {
    const out = clampProposal(proposal('sell', 50, 10), { ...limits, tradableShares: 0 });
    expect(out).toMatchObject({
      direction: 'hold',
      quantity: 0,
      limitPrice: null,
      adjustments: ['sell 50 clamped to tradable 0 (base tranche is locked)', 'sell reduced to nothing; replaced by hold']
    });
  });

  it('drops quantities attached to a hold', () => {
    expect(clampProposal(proposal('hold', 300, 10, 9.5), limits)).toMatchObject({
      direction: 'hold',
      quantity: 0,
      limitPrice: null,
      stopLoss: 9.5,
      adjustments: ['hold carries no quantity; 300 dropped']
    });
  });

  it('allows nothing actionable without a band', () => {
    const out = clampProposal(proposal('sell', 200, 10.5, 9.5), { ...limits, band: null, observationOnly: true });
    expect(out).toEqual({
      direction: 'hold',
      quantity: 0,
      limitPrice: null,
      stopLoss: null,
      commentary: 'test',
      adjustments: ['observation-only run: sell 200 replaced by hold']
    });
  });
});

describe('clampFinalOrder', () => {
  it('abstains rather than holds when nothing is left', () => {
    const out = clampFinalOrder({ action: 'buy', quantity: 0, limitPrice: 10, commentary: 'none' }, limits);
    expect(out).toEqual({
      action: 'abstain',
      quantity: 0,
      limitPrice: null,
      commentary: 'none',
      adjustments: ['buy reduced to nothing; replaced by abstain']
    });
  });

  it('abstains on observation-only runs', () => {
    const out = clampFinalOrder({ action: 'buy', quantity: 100, limitPrice: 10, commentary: 'x' }, { ...limits, observationOnly: true });
    expect(out.action).toBe('abstain');
    expect(out.adjustments).toEqual(['observation-only run: buy 100 replaced by abstain']);
  });

  it('passes an order already inside the limits', () => {
    const out = clampFinalOrder({ action: 'sell', quantity: 80, limitPrice: 10.8, commentary: 'ok' }, limits);
    expect(out).toEqual({ action: 'sell', quantity: 80, limitPrice: 10.8, commentary: 'ok', adjustments: [] });
  });
});
