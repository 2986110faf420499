import { MinuteBar, Quote } from '../core/types';
import { hashString, mulberry32 } from '../core/utils';
import { classifyInstrument } from '../market/instrument';
import { roundPrice } from '../market/priceLimits';
import { QuoteProvider } from './marketData.types';

// Session minutes in exchange time (09:30-11:30, 13:00-15:00).
const sessionMinutes = (): string[] => {
  const out: string[] = [];
  const push = (fromMin: number, toMin: number) => {
    for (let m = fromMin; m < toMin; m++) {
      out.push(`${String(Math.floor(m / 60)).padStart(2, '0')}:${String(m % 60).padStart(2, '0')}`);
    }
  };
  push(9 * 60 + 30, 11 * 60 + 30);
  push(13 * 60, 15 * 60);
  return out;
};

const basePriceForSymbol = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol));
  return symbol.startsWith('5') || symbol.startsWith('1') ? 0.8 + rng() * 3 : 5 + rng() * 45;
};

const closeForDate = (symbol: string, date: string): number => {
  const rng = mulberry32(hashString(`${symbol}-${date}`));
  const noise = (rng() - 0.5) * 0.06; // +/-3%
  return basePriceForSymbol(symbol) * (1 + noise);
};

/**
 * Deterministic, seeded prices for dry runs without a data feed. Timestamps are naive exchange-local
 * times marked +08:00.
 */
export class StubQuoteProvider implements QuoteProvider {
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async getQuote(symbol: string): Promise<Quote> {
    const { precision } = classifyInstrument(symbol);
    const today = this.now().toISOString().slice(0, 10);
    const yesterday = new Date(`${today}T00:00:00Z`);
    yesterday.setUTCDate(yesterday.getUTCDate() - 1);
    const prev = closeForDate(symbol, yesterday.toISOString().slice(0, 10));
    const drift = mulberry32(hashString(`${symbol}-${today}-drift`))() * 0.06 - 0.03;
    return {
      symbol,
      price: roundPrice(prev * (1 + drift), precision),
      prevClose: roundPrice(prev, precision),
      volume: Math.floor(1e5 + mulberry32(hashString(`${symbol}-${today}-vol`))() * 1e6),
      timestamp: this.now().toISOString()
    };
  }

  async getMinuteBars(symbol: string, date: string): Promise<MinuteBar[]> {
    const { precision } = classifyInstrument(symbol);
    const rng = mulberry32(hashString(`${symbol}-${date}-minutes`));
    let price = closeForDate(symbol, date);
    return sessionMinutes().map((clock) => {
      const open = price;
      price = price * (1 + (rng() - 0.5) * 0.004);
      const close = roundPrice(price, precision);
      return {
        timestamp: `${date}T${clock}:00+08:00`,
        open: roundPrice(open, precision),
        high: roundPrice(Math.max(open, price) * 1.001, precision),
        low: roundPrice(Math.min(open, price) * 0.999, precision),
        close,
        volume: Math.floor(rng() * 50000)
      };
    });
  }
}

export const defaultQuoteProvider = new StubQuoteProvider();
