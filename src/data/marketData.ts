import { createLogger } from '../core/logger';
import { QuoteProvider } from './marketData.types';
import { FileQuoteProvider } from './marketData.file';
import { StubQuoteProvider, defaultQuoteProvider } from './marketData.stub';

const log = createLogger('market-data');

export const getQuoteProvider = (dataDir: string): QuoteProvider => {
  const provider = (process.env.QUOTE_PROVIDER || 'file').toLowerCase();
  if (provider === 'stub') {
    log.warn('QUOTE_PROVIDER=stub; using seeded placeholder prices, not market data');
    return defaultQuoteProvider;
  }
  return new FileQuoteProvider(dataDir);
};

export { FileQuoteProvider, StubQuoteProvider };
