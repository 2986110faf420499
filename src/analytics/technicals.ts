import { MinuteBar } from '../core/types';
import { roundPrice } from '../market/priceLimits';

// Below this the slow MACD leg has not warmed up.
export const MIN_BARS_FOR_INDICATORS = 30;

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

export interface TechnicalSnapshot {
  bars: number;
  ma5: number;
  ma10: number;
  ma20: number;
  /** Null when the window had neither gains nor losses. */
  rsi14: number | null;
  macd: { dif: number; dea: number; hist: number };
  kdj: { k: number; d: number; j: number };
  bollinger: { upper: number; middle: number; lower: number };
  signals: string[];
}

export interface IntradaySummary {
  date: string;
  bars: number;
  open: number;
  high: number;
  low: number;
  last: number;
  changePct: number;
  vwap: number;
  lastVsVwapPct: number;
  morningVolumePct: number;
  highTime: string;
  lowTime: string;
}

const mean = (values: number[]): number => values.reduce((acc, v) => acc + v, 0) / values.length;

const tail = (values: number[], period: number): number[] => values.slice(values.length - period);

/** Sample standard deviation (n - 1). */
const sampleStdDev = (values: number[]): number => {
  const avg = mean(values);
  return Math.sqrt(values.reduce((acc, v) => acc + (v - avg) ** 2, 0) / (values.length - 1));
};

/** EMA seeded with the first value, smoothing 2 / (span + 1). */
export const emaSeries = (values: number[], span: number): number[] => {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  values.forEach((value, idx) => {
    out.push(idx === 0 ? value : alpha * value + (1 - alpha) * out[idx - 1]);
  });
  return out;
};

/** Plain moving averages of gains and losses over the last `period` changes. */
export const rsi = (closes: number[], period = 14): number | null => {
  if (closes.length <= period) return null;
  const window = tail(closes, period + 1);
  const changes = window.slice(1).map((close, idx) => close - window[idx]);
  const gain = mean(changes.map((c) => (c > 0 ? c : 0)));
  const loss = mean(changes.map((c) => (c < 0 ? -c : 0)));
  if (loss === 0) return gain === 0 ? null : 100;
  return 100 - 100 / (1 + gain / loss);
};

/**
 * KDJ(9, 3, 3): K and D smooth the raw stochastic value by a third each bar, J = 3K - 2D.
 * A window with no range leaves K and D where they were.
 */
const kdjSeries = (bars: MinuteBar[], window = 9): { k: number[]; d: number[] } => {
  const k: number[] = [];
  const d: number[] = [];
  for (let i = window - 1; i < bars.length; i++) {
    const slice = bars.slice(i - window + 1, i + 1);
    const lowMin = Math.min(...slice.map((b) => b.low));
    const highMax = Math.max(...slice.map((b) => b.high));
    const prevK = k.length ? k[k.length - 1] : null;
    const prevD = d.length ? d[d.length - 1] : null;
    if (highMax === lowMin) {
      if (prevK !== null && prevD !== null) {
        k.push(prevK);
        d.push(prevD);
      }
      continue;
    }
    const rsv = ((bars[i].close - lowMin) / (highMax - lowMin)) * 100;
    const nextK = prevK === null ? rsv : prevK + (rsv - prevK) / 3;
    k.push(nextK);
    d.push(prevD === null ? nextK : prevD + (nextK - prevD) / 3);
  }
  return { k, d };
};

const crossed = (fast: number[], slow: number[], direction: 'up' | 'down'): boolean => {
  if (fast.length < 2 || slow.length < 2) return false;
  const [f1, f0, s1, s0] = [fast[fast.length - 1], fast[fast.length - 2], slow[slow.length - 1], slow[slow.length - 2]];
  return direction === 'up' ? f1 > s1 && f0 <= s0 : f1 < s1 && f0 >= s0;
};

/** MA, RSI, MACD, KDJ and Bollinger over minute closes, oldest first. */
export const computeTechnicals = (bars: MinuteBar[]): TechnicalSnapshot | null => {
  if (bars.length < MIN_BARS_FOR_INDICATORS) return null;
  const closes = bars.map((b) => b.close);

  const ema12 = emaSeries(closes, 12);
  const ema26 = emaSeries(closes, 26);
  const dif = closes.map((_, i) => ema12[i] - ema26[i]);
  const dea = emaSeries(dif, 9);
  const hist = dif.map((v, i) => (v - dea[i]) * 2);
  const last = closes.length - 1;

  const window20 = tail(closes, 20);
  const middle = mean(window20);
  const sigma = sampleStdDev(window20);

  const { k, d } = kdjSeries(bars);
  const kLast = k.length ? k[k.length - 1] : 50;
  const dLast = d.length ? d[d.length - 1] : 50;

  const rsi14 = rsi(closes, 14);
  const signals: string[] = [];
  if (rsi14 !== null && rsi14 > RSI_OVERBOUGHT) signals.push(`RSI overbought (>${RSI_OVERBOUGHT})`);
  else if (rsi14 !== null && rsi14 < RSI_OVERSOLD) signals.push(`RSI oversold (<${RSI_OVERSOLD})`);

  if (hist[last] > 0 && hist[last] > hist[last - 1]) signals.push('MACD histogram expanding above zero');
  else if (hist[last] < 0 && hist[last] < hist[last - 1]) signals.push('MACD histogram expanding below zero');
  else if (crossed(dif, dea, 'up')) signals.push('MACD golden cross');
  else if (crossed(dif, dea, 'down')) signals.push('MACD death cross');

  if (crossed(k, d, 'up')) signals.push('KDJ golden cross');
  if (crossed(k, d, 'down')) signals.push('KDJ death cross');

  return {
    bars: bars.length,
    ma5: mean(tail(closes, 5)),
    ma10: mean(tail(closes, 10)),
    ma20: middle,
    rsi14,
    macd: { dif: dif[last], dea: dea[last], hist: hist[last] },
    kdj: { k: kLast, d: dLast, j: 3 * kLast - 2 * dLast },
    bollinger: { upper: middle + 2 * sigma, middle, lower: middle - 2 * sigma },
    signals
  };
};

const clockOf = (bar: MinuteBar) => bar.timestamp.slice(11, 16);

/** Shape of one session's tape. Bars carry exchange-local stamps; the morning ends at 12:00. */
export const summarizeSession = (bars: MinuteBar[]): IntradaySummary | null => {
  if (!bars.length) return null;
  const first = bars[0];
  const lastBar = bars[bars.length - 1];
  let high = first;
  let low = first;
  let volume = 0;
  let turnover = 0;
  let morningVolume = 0;
  for (const bar of bars) {
    if (bar.high > high.high) high = bar;
    if (bar.low < low.low) low = bar;
    volume += bar.volume;
    turnover += bar.close * bar.volume;
    if (clockOf(bar) < '12:00') morningVolume += bar.volume;
  }
  const vwap = volume > 0 ? turnover / volume : mean(bars.map((b) => b.close));
  return {
    date: first.timestamp.slice(0, 10),
    bars: bars.length,
    open: first.open,
    high: high.high,
    low: low.low,
    last: lastBar.close,
    changePct: roundPrice(((lastBar.close - first.open) / first.open) * 100, 2),
    vwap,
    lastVsVwapPct: roundPrice(((lastBar.close - vwap) / vwap) * 100, 2),
    morningVolumePct: volume > 0 ? roundPrice((morningVolume / volume) * 100, 2) : 0,
    highTime: clockOf(high),
    lowTime: clockOf(low)
  };
};
