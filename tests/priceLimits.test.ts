import { Quote } from '../src/core/types';
import { DataUnavailableError } from '../src/core/errors';
import { classifyInstrument } from '../src/market/instrument';
import { computeBand, isOnTick, resolveBand, resolveBandFromQuote, roundPrice } from '../src/market/priceLimits';
import { StaticQuoteProvider, makeClassifier } from './helpers';

const classifier = makeClassifier();
const preOpen = classifier.classify(new Date('2025-03-03T00:30:00Z'));
const noonBreak = classifier.classify(new Date('2025-03-03T04:00:00Z'));
const postClose = classifier.classify(new Date('2025-03-03T08:00:00Z'));

const quote = (symbol: string, price: number, prevClose: number, timestamp: string): Quote => ({
  symbol,
  price,
  prevClose,
  volume: 1000,
  timestamp
});

describe('roundPrice', () => {
  it('rounds half away from zero', () => {
    expect(roundPrice(0.005, 2)).toBe(0.01);
    expect(roundPrice(1.005, 2)).toBe(1.01);
    expect(roundPrice(2.675, 2)).toBe(2.68);
    expect(roundPrice(-1.005, 2)).toBe(-1.01);
    expect(roundPrice(2.5, 0)).toBe(3);
    expect(roundPrice(1.0005, 3)).toBe(1.001);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundPrice(-0.001, 2), 0)).toBe(true);
  });
});

describe('computeBand', () => {
  const cases: [string, string | undefined, number, number, number][] = [
    ['600000', undefined, 10, 9, 11],
    ['300750', undefined, 10, 8, 12],
    ['688981', undefined, 10, 8, 12],
    ['830799', undefined, 10, 7, 13],
    ['600001', '*ST Example', 10, 9.5, 10.5],
    ['510300', undefined, 3.912, 3.521, 4.303],
    ['588000', undefined, 1, 0.8, 1.2],
    ['600000', undefined, 12.35, 11.12, 13.59]
  ];

  it.each(cases)('%s (%s) anchored at %d', (symbol, name, anchor, down, up) => {
    const instrument = classifyInstrument(symbol, { name });
    const band = computeBand(instrument, anchor, '2025-02-28', '2025-03-03');
    expect(band.limitDown).toBe(down);
    expect(band.limitUp).toBe(up);
    expect(band.limitDown).toBeLessThan(anchor);
    expect(band.limitUp).toBeGreaterThan(anchor);
    expect(isOnTick(band.limitDown, instrument.precision)).toBe(true);
    expect(isOnTick(band.limitUp, instrument.precision)).toBe(true);
  });

  it('refuses a missing anchor', () => {
    const instrument = classifyInstrument('600000');
    expect(() => computeBand(instrument, 0, '2025-02-28', '2025-03-03')).toThrow(DataUnavailableError);
    expect(() => computeBand(instrument, Number.NaN, '2025-02-28', '2025-03-03')).toThrow(DataUnavailableError);
  });
});

describe('anchor selection', () => {
  const instrument = classifyInstrument('600000');

  it('anchors on the last price of a snapshot taken after the previous close', () => {
    const resolution = resolveBandFromQuote(instrument, preOpen, quote('600000', 10.5, 10, '2025-02-28T15:10:00+08:00'));
    if (!resolution.available) throw new Error('expected a band');
    expect(resolution.anchorSource).toBe('close');
    expect(resolution.band).toMatchObject({ anchorPrice: 10.5, anchorDate: '2025-02-28', targetDate: '2025-03-03', limitDown: 9.45, limitUp: 11.55 });
  });

  it('anchors on the previous close of a quote from the current session', () => {
    const resolution = resolveBandFromQuote(instrument, noonBreak, quote('600000', 10.5, 10, '2025-03-03T11:29:00+08:00'));
    if (!resolution.available) throw new Error('expected a band');
    expect(resolution.anchorSource).toBe('prev_close');
    expect(resolution.band).toMatchObject({ anchorPrice: 10, anchorDate: '2025-02-28', targetDate: '2025-03-03', limitDown: 9, limitUp: 11 });
  });

  it("anchors on today's close after the session and targets the next trading day", () => {
    const resolution = resolveBandFromQuote(instrument, postClose, quote('600000', 10.5, 10, '2025-03-03T15:10:00+08:00'));
    if (!resolution.available) throw new Error('expected a band');
    expect(resolution.anchorSource).toBe('close');
    expect(resolution.band).toMatchObject({ anchorPrice: 10.5, anchorDate: '2025-03-03', targetDate: '2025-03-04', limitDown: 9.45, limitUp: 11.55 });
  });

  it("reads yesterday's evening snapshot as yesterday's close before the next open", () => {
    const nextPreOpen = classifier.classify(new Date('2025-03-04T00:30:00Z'));
    const resolution = resolveBandFromQuote(instrument, nextPreOpen, quote('600000', 10.5, 10, '2025-03-03T15:10:00+08:00'));
    if (!resolution.available) throw new Error('expected a band');
    expect(resolution.band).toMatchObject({ anchorPrice: 10.5, anchorDate: '2025-03-03', targetDate: '2025-03-04', limitDown: 9.45, limitUp: 11.55 });
  });

  it("refuses yesterday's snapshot as today's close", () => {
    const nextPostClose = classifier.classify(new Date('2025-03-04T08:00:00Z'));
    expect(resolveBandFromQuote(instrument, nextPostClose, quote('600000', 10.5, 10, '2025-03-03T15:10:00+08:00'))).toEqual({
      available: false,
      reason: 'quote taken at 2025-03-03T15:10:00+08:00 does not carry the 2025-03-04 close'
    });
  });

  it('refuses a snapshot from two sessions back before the open', () => {
    expect(resolveBandFromQuote(instrument, preOpen, quote('600000', 10.5, 10, '2025-02-27T15:10:00+08:00'))).toEqual({
      available: false,
      reason: 'quote taken at 2025-02-27T15:10:00+08:00 does not carry the 2025-02-28 close'
    });
  });

  it('refuses an intraday snapshot after the close', () => {
    expect(resolveBandFromQuote(instrument, postClose, quote('600000', 10.5, 10, '2025-03-03T14:30:00+08:00')).available).toBe(false);
  });

  it("anchors a weekend run on Friday's close", () => {
    const saturday = classifier.classify(new Date('2025-03-01T04:00:00Z'));
    const resolution = resolveBandFromQuote(instrument, saturday, quote('600000', 10.5, 10, '2025-02-28T15:10:00+08:00'));
    if (!resolution.available) throw new Error('expected a band');
    expect(resolution.band).toMatchObject({ anchorPrice: 10.5, anchorDate: '2025-02-28', targetDate: '2025-03-03' });
  });
});

describe('fail-closed band resolution', () => {
  const instrument = classifyInstrument('600000');

  it('reports unavailable without a quote or anchor', () => {
    expect(resolveBandFromQuote(instrument, preOpen, null)).toEqual({ available: false, reason: 'quote unavailable' });
    expect(resolveBandFromQuote(instrument, noonBreak, quote('600000', 10.5, 0, '2025-03-03T11:00:00+08:00'))).toEqual({
      available: false,
      reason: 'anchor prev_close missing from quote'
    });
    expect(resolveBandFromQuote(instrument, postClose, quote('600000', 0, 10, '2025-03-03T15:10:00+08:00'))).toEqual({
      available: false,
      reason: 'anchor close missing from quote'
    });
  });

  it('turns provider failures into an unavailable band', async () => {
    const resolution = await resolveBand(instrument, preOpen, new StaticQuoteProvider());
    expect(resolution).toEqual({ available: false, reason: '600000: no quote in fixture' });
  });

  it('resolves through the provider when the quote is there', async () => {
    const provider = new StaticQuoteProvider().setQuote(quote('600000', 10.2, 10, '2025-02-28T15:10:00+08:00'));
    const resolution = await resolveBand(instrument, preOpen, provider);
    expect(resolution.available).toBe(true);
  });
});
