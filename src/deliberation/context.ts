import { BandResolution, Instrument, IntelRecord, PromptVariant, Quote, SessionInfo } from '../core/types';
import { IntradaySummary, TechnicalSnapshot, computeTechnicals, summarizeSession } from '../analytics/technicals';
import { DeliberationBlockedError, errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';
import { parseTimestamp } from '../core/time';
import { QuoteProvider } from '../data/marketData.types';
import { formatIntelForPrompt, normalizeIntel } from '../intel/intelRecord';
import { PositionExposure, PositionLedger } from '../ledger/positionLedger';
import { classifyInstrument, normalizeSymbol } from '../market/instrument';
import { resolveBandFromQuote } from '../market/priceLimits';
import { SessionClassifier } from '../market/session';

const log = createLogger('context');

export interface MarketTape {
  date: string;
  intraday: IntradaySummary | null;
  technicals: TechnicalSnapshot | null;
}

export interface DeliberationContext {
  symbol: string;
  name: string;
  instrument: Instrument;
  session: SessionInfo;
  promptVariant: PromptVariant;
  asOf: string;
  quote: Quote | null;
  /** Minute bars of the last session up to the run instant; null when the feed failed. */
  tape: MarketTape | null;
  band: BandResolution;
  /** Last price, or the band anchor when no live price exists. Null only when the band is unavailable. */
  referencePrice: number | null;
  exposure: PositionExposure;
  intel: IntelRecord[];
  intelText: string;
  observationOnly: boolean;
}

export interface ContextDeps {
  classifier: SessionClassifier;
  ledger: PositionLedger;
  quotes: QuoteProvider;
}

export interface ContextInput {
  symbol: string;
  now: Date;
  name?: string;
  intel?: unknown;
  intelMaxAgeHours?: number;
}

const fetchQuote = async (quotes: QuoteProvider, symbol: string): Promise<Quote | null> => {
  try {
    return await quotes.getQuote(symbol);
  } catch (err) {
    log.warn('Quote unavailable', { symbol, error: errorMessage(err) });
    return null;
  }
};

// The session whose bars the specialists read: this morning at the lunch break, today after a trading
// day's close, otherwise the last trading day.
const tapeDate = (session: SessionInfo): string =>
  session.phase === 'noon_break' || (session.phase === 'post_close' && session.tradingDay)
    ? session.localDate
    : session.previousTradableDate;

const loadTape = async (quotes: QuoteProvider, symbol: string, session: SessionInfo, now: Date): Promise<MarketTape | null> => {
  const date = tapeDate(session);
  try {
    const bars = (await quotes.getMinuteBars(symbol, date)).filter((bar) => parseTimestamp(bar.timestamp) <= now.getTime());
    return { date, intraday: summarizeSession(bars), technicals: computeTechnicals(bars) };
  } catch (err) {
    log.warn('Minute bars unavailable', { symbol, date, error: errorMessage(err) });
    return null;
  }
};

/**
 * Everything a run needs, fixed at start. The session is classified from the injected instant and
 * passed along; nothing downstream reads the wall clock to pick a variant.
 */
export const buildDeliberationContext = async (deps: ContextDeps, input: ContextInput): Promise<DeliberationContext> => {
  const symbol = normalizeSymbol(input.symbol);
  const session = deps.classifier.classify(input.now);
  if (session.phase === 'intraday' || session.promptVariant === null) {
    throw new DeliberationBlockedError(
      `${symbol}: deliberation is not available during continuous trading (${session.localDate} ${session.localTime})`
    );
  }

  const quote = await fetchQuote(deps.quotes, symbol);
  const tape = await loadTape(deps.quotes, symbol, session, input.now);
  const name = input.name ?? quote?.name ?? symbol;
  const instrument = classifyInstrument(symbol, { name });
  const band = resolveBandFromQuote(instrument, session, quote);
  if (!band.available) {
    log.warn('Band unavailable; run is observation-only', { symbol, reason: band.reason });
  }

  const livePrice = quote && Number.isFinite(quote.price) && quote.price > 0 ? quote.price : null;
  const referencePrice = livePrice ?? (band.available ? band.band.anchorPrice : null);
  const asOf = input.now.toISOString();
  const intel = normalizeIntel(input.intel ?? [], { now: input.now });

  return {
    symbol,
    name,
    instrument,
    session,
    promptVariant: session.promptVariant,
    asOf,
    quote,
    tape,
    band,
    referencePrice,
    exposure: deps.ledger.exposureAt(symbol, asOf, referencePrice),
    intel,
    intelText: formatIntelForPrompt(intel, { now: input.now, maxAgeHours: input.intelMaxAgeHours }),
    observationOnly: !band.available
  };
};
