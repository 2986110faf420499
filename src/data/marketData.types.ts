import { MinuteBar, Quote } from '../core/types';

export interface QuoteProvider {
  /** Latest quote; throws DataUnavailableError when the source has nothing usable. */
  getQuote(symbol: string): Promise<Quote>;
  /** Minute bars of one exchange date, ascending; empty when the day had no trading. */
  getMinuteBars(symbol: string, date: string): Promise<MinuteBar[]>;
}
