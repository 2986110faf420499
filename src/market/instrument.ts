import { Board, Instrument } from '../core/types';
import { InvalidInstrumentError } from '../core/errors';

const ETF_PREFIXES = ['51', '56', '58', '15'];
const STAR_ETF_PREFIX = '588';

export interface InstrumentHints {
  name?: string; // exchange display name; carries the ST marker
}

/** Accepts `600519`, `600519.SH`, `sh600519` and similar, returns the bare six-digit code. */
export const normalizeSymbol = (raw: string): string => {
  const trimmed = raw.trim().toUpperCase();
  const stripped = trimmed.replace(/^(SH|SZ|BJ)/, '').replace(/\.(SH|SZ|BJ|SS)$/, '');
  if (!/^\d{6}$/.test(stripped)) {
    throw new InvalidInstrumentError(raw);
  }
  return stripped;
};

// ST names are prefixed: ST, *ST, SST, S*ST
const isSpecialTreatment = (name?: string): boolean => Boolean(name && /^(\*|S\*?)?ST(?![A-Za-z])/.test(name.trim()));

const stockBoard = (code: string, name?: string): Board => {
  if (code.startsWith('688') || code.startsWith('689')) return 'star';
  if (code.startsWith('300') || code.startsWith('301')) return 'chinext';
  if (code.startsWith('4') || code.startsWith('8') || code.startsWith('92')) return 'bse';
  return isSpecialTreatment(name) ? 'st' : 'main';
};

export const classifyInstrument = (symbol: string, hints: InstrumentHints = {}): Instrument => {
  const code = normalizeSymbol(symbol);
  if (ETF_PREFIXES.some((p) => code.startsWith(p))) {
    return {
      symbol: code,
      assetClass: 'etf',
      // STAR-index funds inherit the constituents' 20% limit
      board: code.startsWith(STAR_ETF_PREFIX) ? 'star' : 'main',
      precision: 3
    };
  }
  return { symbol: code, assetClass: 'stock', board: stockBoard(code, hints.name), precision: 2 };
};
