export * from './core/types';
export * from './core/errors';
export { DeskConfig, loadConfig, parseConfig, loadHolidays } from './core/config';
export { createLogger, Logger } from './core/logger';
export { KeyedMutex } from './core/lock';
export { SessionClassifier } from './market/session';
export { classifyInstrument, normalizeSymbol } from './market/instrument';
export { BAND_PCT, computeBand, resolveBand, resolveBandFromQuote, roundPrice, selectAnchor } from './market/priceLimits';
export { QuoteProvider } from './data/marketData.types';
export { FileQuoteProvider, StubQuoteProvider, getQuoteProvider } from './data/marketData';
export { displayCost } from './ledger/costBasis';
export { PositionLedger, PositionExposure, TradeInput } from './ledger/positionLedger';
export { FileStore, MemoryStore, PersistenceStore } from './ledger/storage';
export { computeTechnicals, summarizeSession, IntradaySummary, TechnicalSnapshot } from './analytics/technicals';
export { formatIntelForPrompt, normalizeIntel } from './intel/intelRecord';
export { AgentClient } from './agents/agentClient';
export { DispatchTable, resolveDispatch } from './agents/dispatch';
export { OpenAICompatibleClient, getAgentClient } from './agents/openaiCompatibleClient';
export { StubAgentClient } from './agents/stubAgentClient';
export { parseAgentJson } from './agents/parsing';
export { clampFinalOrder, clampProposal } from './deliberation/clamp';
export { buildDeliberationContext, DeliberationContext } from './deliberation/context';
export { DeliberationRun, RunSnapshot, RunState, startDeliberation } from './deliberation/pipeline';
export { RunRegistry } from './deliberation/runRegistry';
export { StrategyLog } from './strategyLog/strategyLog';
export { buildAlphaExtractionRequest, runBacktest, scoresFor, BacktestResult } from './backtest/backtestEngine';
export { createDesk, loadDesk, Desk } from './desk';
