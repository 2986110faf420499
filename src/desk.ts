import { DeskConfig, loadConfig, loadHolidays } from './core/config';
import { AgentClient } from './agents/agentClient';
import { DispatchTable, resolveDispatch } from './agents/dispatch';
import { getAgentClient } from './agents/openaiCompatibleClient';
import { QuoteProvider } from './data/marketData.types';
import { getQuoteProvider } from './data/marketData';
import { PositionLedger } from './ledger/positionLedger';
import { FileStore, PersistenceStore } from './ledger/storage';
import { SessionClassifier } from './market/session';
import { StrategyLog } from './strategyLog/strategyLog';

/** The wired collaborators every entry point works with. */
export interface Desk {
  config: DeskConfig;
  classifier: SessionClassifier;
  store: PersistenceStore;
  ledger: PositionLedger;
  quotes: QuoteProvider;
  strategyLog: StrategyLog;
  dispatch: DispatchTable;
  client: AgentClient;
}

export interface DeskOverrides {
  store?: PersistenceStore;
  quotes?: QuoteProvider;
  client?: AgentClient;
  holidays?: Iterable<string>;
}

export const createDesk = (config: DeskConfig, overrides: DeskOverrides = {}): Desk => {
  const store = overrides.store ?? new FileStore(config.dataDir);
  const dispatch = resolveDispatch(config);
  return {
    config,
    classifier: new SessionClassifier({ timezone: config.timezone, holidays: overrides.holidays ?? loadHolidays(config) }),
    store,
    ledger: new PositionLedger({ store, checkpointInterval: config.checkpointInterval, fallbackCapital: config.totalCapital }),
    quotes: overrides.quotes ?? getQuoteProvider(config.dataDir),
    strategyLog: new StrategyLog(store),
    dispatch,
    client: overrides.client ?? getAgentClient(dispatch, { timeoutMs: config.agentTimeoutMs })
  };
};

export const loadDesk = (): Desk => createDesk(loadConfig());
