import { BacktestScore, DecisionRecord, MinuteBar, TradeEvent } from '../core/types';
import { createLogger } from '../core/logger';
import { parseTimestamp } from '../core/time';
import { QuoteProvider } from '../data/marketData.types';
import { PositionLedger } from '../ledger/positionLedger';
import { normalizeSymbol } from '../market/instrument';
import { SessionClassifier } from '../market/session';
import { StrategyLog } from '../strategyLog/strategyLog';
import { BOARD_LOT } from '../deliberation/clamp';

const log = createLogger('backtest');

export const USER_PARTICIPANT = 'user';

export interface BacktestParams {
  symbol: string;
  from: string;
  to: string;
  initialCapital: number;
  /** Model tags to replay; defaults to every tag with a completed decision in the range. */
  participants?: string[];
}

export interface BacktestDeps {
  classifier: SessionClassifier;
  quotes: QuoteProvider;
  ledger: PositionLedger;
  strategyLog: StrategyLog;
}

export interface BacktestPoint {
  timestamp: string;
  price: number;
  equity: Record<string, number>;
}

export interface BacktestFill {
  participant: string;
  timestamp: string;
  side: 'buy' | 'sell' | 'override';
  quantity: number;
  price: number;
  sourceId: string; // decision id, or trade id for the user
}

export interface ParticipantSummary {
  participant: string;
  startEquity: number;
  finalEquity: number;
  returnPct: number;
  maxDrawdownPct: number;
  fills: number;
}

export interface BacktestResult {
  symbol: string;
  from: string;
  to: string;
  initialCapital: number;
  startShares: number;
  participants: string[];
  points: BacktestPoint[];
  fills: BacktestFill[];
  summaries: Record<string, ParticipantSummary>;
  /** Minutes where the user traded and ended the minute ahead of every model. */
  alphaMinutes: string[];
}

interface Book {
  cash: number;
  shares: number;
  peak: number;
  maxDrawdown: number;
  fills: number;
}

const round = (value: number, digits: number) => Number(value.toFixed(digits));

const markToMarket = (book: Book, price: number): number => {
  const equity = book.cash + book.shares * price;
  book.peak = Math.max(book.peak, equity);
  const drawdown = book.peak > 0 ? (book.peak - equity) / book.peak : 0;
  book.maxDrawdown = Math.max(book.maxDrawdown, drawdown);
  return equity;
};

/** Latest decision created at or before `ts`: older unfilled orders are superseded by it. */
const activeDecision = (decisions: DecisionRecord[], ts: number): DecisionRecord | undefined => {
  let found: DecisionRecord | undefined;
  for (const record of decisions) {
    if (parseTimestamp(record.createdAt) <= ts) found = record;
  }
  return found;
};

const loadBars = async (deps: BacktestDeps, symbol: string, days: string[]): Promise<MinuteBar[]> => {
  const bars: MinuteBar[] = [];
  for (const day of days) {
    const dayBars = await deps.quotes.getMinuteBars(symbol, day);
    if (!dayBars.length) {
      log.warn('No minute bars for trading day', { symbol, day });
    }
    bars.push(...dayBars);
  }
  return bars.sort((a, b) => parseTimestamp(a.timestamp) - parseTimestamp(b.timestamp));
};

/**
 * Minute-by-minute replay of each model's logged final orders against the user's actual trades.
 * Every participant starts from the same cash and the ledger position just before the first bar.
 */
export const runBacktest = async (params: BacktestParams, deps: BacktestDeps): Promise<BacktestResult> => {
  const symbol = normalizeSymbol(params.symbol);
  const days = deps.classifier.tradingDaysBetween(params.from, params.to);
  const bars = await loadBars(deps, symbol, days);

  // holds and abstentions stay in: a newer one supersedes an older unfilled order
  const decisions = deps.strategyLog.list(symbol).filter((d) => d.status === 'completed');
  const modelTags = params.participants?.filter((p) => p !== USER_PARTICIPANT) ?? Array.from(new Set(decisions.map((d) => d.modelTag)));
  const decisionsByTag = new Map<string, DecisionRecord[]>(
    modelTags.map((tag): [string, DecisionRecord[]] => [tag, decisions.filter((d) => d.modelTag === tag)])
  );
  const participants = [...modelTags, USER_PARTICIPANT];

  const firstTs = bars.length ? parseTimestamp(bars[0].timestamp) : parseTimestamp(`${params.from}T00:00:00Z`);
  const start = deps.ledger.snapshotAt(symbol, new Date(firstTs - 1).toISOString());
  const userTrades: TradeEvent[] = deps.ledger.history(symbol).filter((t) => parseTimestamp(t.timestamp) >= firstTs);

  const books = new Map<string, Book>(
    participants.map((p): [string, Book] => [p, { cash: params.initialCapital, shares: start.shares, peak: 0, maxDrawdown: 0, fills: 0 }])
  );
  const startPrice = bars.length ? bars[0].open : 0;
  const startEquity = params.initialCapital + start.shares * startPrice;
  const acted = new Set<string>();
  const fills: BacktestFill[] = [];
  const points: BacktestPoint[] = [];
  const alphaMinutes: string[] = [];
  let tradeCursor = 0;

  const bookFor = (participant: string): Book => {
    const book = books.get(participant);
    if (!book) throw new Error(`Unknown participant ${participant}`);
    return book;
  };

  for (const bar of bars) {
    const ts = parseTimestamp(bar.timestamp);
    const barDate = bar.timestamp.slice(0, 10);
    const price = bar.close;

    for (const tag of modelTags) {
      const decision = activeDecision(decisionsByTag.get(tag) ?? [], ts);
      if (!decision || acted.has(decision.id) || barDate < decision.targetDate || !decision.finalDecision) continue;
      const order = decision.finalDecision;
      const limit = order.limitPrice ?? price;
      const book = bookFor(tag);
      let quantity = 0;
      if (order.direction === 'buy' && price <= limit) {
        quantity = Math.min(order.size, Math.floor(book.cash / limit / BOARD_LOT) * BOARD_LOT);
        book.cash -= quantity * limit;
        book.shares += quantity;
      } else if (order.direction === 'sell' && price >= limit) {
        quantity = Math.min(order.size, book.shares);
        book.cash += quantity * limit;
        book.shares -= quantity;
      } else {
        continue;
      }
      acted.add(decision.id);
      if (quantity > 0) {
        book.fills += 1;
        fills.push({ participant: tag, timestamp: bar.timestamp, side: order.direction, quantity, price: limit, sourceId: decision.id });
      }
    }

    const user = bookFor(USER_PARTICIPANT);
    let userTraded = false;
    while (tradeCursor < userTrades.length && parseTimestamp(userTrades[tradeCursor].timestamp) <= ts) {
      const trade = userTrades[tradeCursor];
      tradeCursor += 1;
      if (trade.side === 'buy') {
        user.cash -= trade.quantity * trade.price;
        user.shares += trade.quantity;
      } else if (trade.side === 'sell') {
        user.cash += trade.quantity * trade.price;
        user.shares -= trade.quantity;
      } else {
        user.shares = trade.quantity;
      }
      user.fills += 1;
      userTraded = true;
      fills.push({ participant: USER_PARTICIPANT, timestamp: bar.timestamp, side: trade.side, quantity: trade.quantity, price: trade.price, sourceId: trade.id });
    }

    const equity: Record<string, number> = {};
    for (const participant of participants) {
      equity[participant] = round(markToMarket(bookFor(participant), price), 2);
    }
    points.push({ timestamp: bar.timestamp, price, equity });

    const userEquity = equity[USER_PARTICIPANT];
    if (userTraded && modelTags.length && modelTags.every((tag) => userEquity > equity[tag])) {
      alphaMinutes.push(bar.timestamp);
    }
  }

  const last = points.length ? points[points.length - 1] : undefined;
  const summaries: Record<string, ParticipantSummary> = {};
  for (const participant of participants) {
    const finalEquity = last ? last.equity[participant] : startEquity;
    summaries[participant] = {
      participant,
      startEquity: round(startEquity, 2),
      finalEquity,
      returnPct: startEquity > 0 ? round(((finalEquity - startEquity) / startEquity) * 100, 4) : 0,
      maxDrawdownPct: round(bookFor(participant).maxDrawdown * 100, 4),
      fills: bookFor(participant).fills
    };
  }

  log.info('Backtest finished', { symbol, from: params.from, to: params.to, bars: bars.length, alphaMinutes: alphaMinutes.length });
  return {
    symbol,
    from: params.from,
    to: params.to,
    initialCapital: params.initialCapital,
    startShares: start.shares,
    participants,
    points,
    fills,
    summaries,
    alphaMinutes
  };
};

/** Scores for every logged decision whose target session falls inside the replayed range. */
export const scoresFor = (result: BacktestResult, decisions: DecisionRecord[], scoredAt: Date): { id: string; score: BacktestScore }[] => {
  const user = result.summaries[USER_PARTICIPANT];
  return decisions
    .filter((d) => d.symbol === result.symbol && d.targetDate >= result.from && d.targetDate <= result.to)
    .filter((d) => result.summaries[d.modelTag])
    .map((d) => ({
      id: d.id,
      score: {
        scoredAt: scoredAt.toISOString(),
        from: result.from,
        to: result.to,
        returnPct: result.summaries[d.modelTag].returnPct,
        userReturnPct: user ? user.returnPct : 0
      }
    }));
};

export interface AlphaExtractionRequest {
  systemPrompt: string;
  userPrompt: string;
}

const ALPHA_WINDOW = 15;

/**
 * Prompt pair asking a model to explain what the user saw at an alpha minute. Only builds the
 * request; the caller decides whether to send it.
 */
export const buildAlphaExtractionRequest = (result: BacktestResult, minute: string): AlphaExtractionRequest => {
  const idx = result.points.findIndex((p) => p.timestamp === minute);
  if (idx < 0) {
    throw new Error(`Minute ${minute} is not part of the backtest of ${result.symbol}`);
  }
  const window = result.points.slice(Math.max(0, idx - ALPHA_WINDOW), idx + ALPHA_WINDOW + 1);
  const models = result.participants.filter((p) => p !== USER_PARTICIPANT);
  const trades = result.fills.filter((f) => f.participant === USER_PARTICIPANT && f.timestamp === minute);
  const rows = window.map((p) => {
    const marker = p.timestamp === minute ? ' <==' : '';
    const equities = result.participants.map((name) => `${name}=${p.equity[name]}`).join(' ');
    return `${p.timestamp} price=${p.price} ${equities}${marker}`;
  });
  return {
    systemPrompt:
      'You review trades by a discretionary A-share trader. At the marked minute the trader acted and finished ahead of ' +
      'every model. Identify the observable pattern the trader reacted to and state it as a rule a model could follow. ' +
      'Reply with one JSON object: {"pattern": "<what was visible>", "trigger": "<the condition>", "rule": "<the instruction>"}',
    userPrompt: [
      `Symbol: ${result.symbol}; range ${result.from} to ${result.to}; models: ${models.join(', ') || 'none'}`,
      `Trader actions at ${minute}: ${trades.map((t) => `${t.side} ${t.quantity} @ ${t.price}`).join('; ') || 'none recorded'}`,
      '',
      'Minute window:',
      ...rows
    ].join('\n')
  };
};
