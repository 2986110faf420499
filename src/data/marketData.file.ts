import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MinuteBar, Quote } from '../core/types';
import { DataUnavailableError } from '../core/errors';
import { readJSONFile } from '../core/utils';
import { QuoteProvider } from './marketData.types';

const quoteSchema = z.object({
  symbol: z.string(),
  price: z.number().nonnegative(),
  prevClose: z.number().nonnegative(),
  volume: z.number().nonnegative(),
  timestamp: z.string(),
  name: z.string().optional()
});

const minuteBarSchema = z.object({
  timestamp: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number()
});

/**
 * Reads snapshots that an external fetcher drops under `<dataDir>/quotes/<symbol>.json` and
 * `<dataDir>/minutes/<symbol>/<date>.json`.
 */
export class FileQuoteProvider implements QuoteProvider {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  async getQuote(symbol: string): Promise<Quote> {
    const file = path.join(this.baseDir, 'quotes', `${symbol}.json`);
    if (!fs.existsSync(file)) {
      throw new DataUnavailableError(symbol, `no quote snapshot at ${file}`);
    }
    const parsed = quoteSchema.safeParse(readJSONFile<unknown>(file));
    if (!parsed.success) {
      throw new DataUnavailableError(symbol, `malformed quote snapshot: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async getMinuteBars(symbol: string, date: string): Promise<MinuteBar[]> {
    const file = path.join(this.baseDir, 'minutes', symbol, `${date}.json`);
    if (!fs.existsSync(file)) return [];
    const parsed = z.array(minuteBarSchema).safeParse(readJSONFile<unknown>(file));
    if (!parsed.success) {
      throw new DataUnavailableError(symbol, `malformed minute bars for ${date}`);
    }
    return parsed.data.slice().sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
  }
}
