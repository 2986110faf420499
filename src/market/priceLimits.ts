import Decimal from 'decimal.js';
import { BandResolution, Board, Instrument, PriceBand, Quote, SessionInfo } from '../core/types';
import { DataUnavailableError, RoundingPolicyViolation, errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';
import { zonedParts } from '../core/time';
import { QuoteProvider } from '../data/marketData.types';
import { CLOSING_BELL, MORNING_OPEN } from './session';

const log = createLogger('price-limits');

export const BAND_PCT: Record<Board, number> = {
  main: 0.1,
  chinext: 0.2,
  star: 0.2,
  bse: 0.3,
  st: 0.05
};

/** Round half away from zero at `precision` decimals, the exchange rule for limit prices. */
export const roundPrice = (value: number | Decimal, precision: number): number => {
  const rounded = new Decimal(value).toDecimalPlaces(precision, Decimal.ROUND_HALF_UP).toNumber();
  return rounded === 0 ? 0 : rounded;
};

export const isOnTick = (value: number, precision: number): boolean => new Decimal(value).decimalPlaces() <= precision;

export const assertRoundedLimit = (label: string, raw: Decimal, rounded: number, precision: number) => {
  if (!isOnTick(rounded, precision)) {
    throw new RoundingPolicyViolation(`${label} ${rounded} is not a multiple of 10^-${precision}`);
  }
  const halfTick = new Decimal(0.5).dividedBy(new Decimal(10).pow(precision));
  if (new Decimal(rounded).minus(raw).abs().greaterThan(halfTick)) {
    throw new RoundingPolicyViolation(`${label} ${rounded} drifted more than half a tick from ${raw.toString()}`);
  }
};

export const bandPctFor = (instrument: Instrument): number => BAND_PCT[instrument.board];

export const computeBand = (
  instrument: Instrument,
  anchorPrice: number,
  anchorDate: string,
  targetDate: string
): PriceBand => {
  if (!Number.isFinite(anchorPrice) || anchorPrice <= 0) {
    throw new DataUnavailableError(instrument.symbol, `no usable anchor price (${anchorPrice})`);
  }
  const pct = bandPctFor(instrument);
  const anchor = new Decimal(anchorPrice);
  const rawUp = anchor.times(new Decimal(1).plus(pct));
  const rawDown = anchor.times(new Decimal(1).minus(pct));
  const limitUp = roundPrice(rawUp, instrument.precision);
  const limitDown = roundPrice(rawDown, instrument.precision);
  assertRoundedLimit('limitUp', rawUp, limitUp, instrument.precision);
  assertRoundedLimit('limitDown', rawDown, limitDown, instrument.precision);
  return {
    symbol: instrument.symbol,
    limitUp,
    limitDown,
    anchorPrice,
    anchorDate,
    targetDate,
    bandPct: pct,
    precision: instrument.precision
  };
};

export interface AnchorSelection {
  price: number;
  date: string;
  source: 'prev_close' | 'close';
}

export type AnchorResult = { ok: true; anchor: AnchorSelection } | { ok: false; reason: string };

/**
 * Whether `timestamp` falls between the close of `closeDate` and the open of `nextOpenDate`, when the
 * last price of a snapshot is that day's close.
 */
const takenAfterClose = (timestamp: string, timezone: string, closeDate: string, nextOpenDate: string): boolean => {
  const local = zonedParts(new Date(timestamp), timezone);
  if (local.date === closeDate) return local.minuteOfDay >= CLOSING_BELL;
  if (local.date === nextOpenDate) return local.minuteOfDay < MORNING_OPEN;
  return local.date > closeDate && local.date < nextOpenDate;
};

const takenDuringSession = (timestamp: string, timezone: string, sessionDate: string): boolean => {
  const local = zonedParts(new Date(timestamp), timezone);
  return local.date === sessionDate && local.minuteOfDay >= MORNING_OPEN;
};

/**
 * Before the close the band hangs off the previous trading day's close; after the close it hangs off
 * today's close and describes the next tradable date. The quote's own timestamp decides which of its
 * fields holds that close: a snapshot taken after the reference close carries it as `price`, one taken
 * during the current session carries it as `prevClose`. A quote from any other time is stale.
 */
export const selectAnchor = (session: SessionInfo, quote: Quote): AnchorResult => {
  const afterClose = session.phase === 'post_close';
  const closeDate = afterClose && session.tradingDay ? session.localDate : session.previousTradableDate;
  const nextOpenDate = afterClose ? session.nextTradableDate : session.localDate;
  if (Number.isNaN(new Date(quote.timestamp).getTime())) {
    return { ok: false, reason: `quote timestamp ${quote.timestamp} is unreadable` };
  }

  let anchor: AnchorSelection;
  if (takenAfterClose(quote.timestamp, session.timezone, closeDate, nextOpenDate)) {
    anchor = { price: quote.price, date: closeDate, source: 'close' };
  } else if (!afterClose && takenDuringSession(quote.timestamp, session.timezone, session.localDate)) {
    anchor = { price: quote.prevClose, date: closeDate, source: 'prev_close' };
  } else {
    return { ok: false, reason: `quote taken at ${quote.timestamp} does not carry the ${closeDate} close` };
  }
  if (!Number.isFinite(anchor.price) || anchor.price <= 0) {
    return { ok: false, reason: `anchor ${anchor.source} missing from quote` };
  }
  return { ok: true, anchor };
};

export const resolveBandFromQuote = (instrument: Instrument, session: SessionInfo, quote: Quote | null): BandResolution => {
  if (!quote) {
    return { available: false, reason: 'quote unavailable' };
  }
  const selection = selectAnchor(session, quote);
  if (!selection.ok) {
    return { available: false, reason: selection.reason };
  }
  const { anchor } = selection;
  return {
    available: true,
    band: computeBand(instrument, anchor.price, anchor.date, session.targetDate),
    anchorSource: anchor.source
  };
};

/** Fails closed: any data problem yields `available: false`, never a zero or cached price. */
export const resolveBand = async (
  instrument: Instrument,
  session: SessionInfo,
  provider: QuoteProvider
): Promise<BandResolution> => {
  try {
    const quote = await provider.getQuote(instrument.symbol);
    return resolveBandFromQuote(instrument, session, quote);
  } catch (err) {
    if (err instanceof RoundingPolicyViolation) throw err;
    log.warn('Band unavailable; degrading to observation-only', { symbol: instrument.symbol, error: errorMessage(err) });
    return { available: false, reason: errorMessage(err) };
  }
};
