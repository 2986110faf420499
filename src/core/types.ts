export type AssetClass = 'stock' | 'etf';
export type Board = 'main' | 'chinext' | 'star' | 'bse' | 'st';

export interface Instrument {
  symbol: string;
  assetClass: AssetClass;
  board: Board;
  precision: number; // decimal places of a quotable price
}

export interface PriceBand {
  symbol: string;
  limitUp: number;
  limitDown: number;
  anchorPrice: number;
  anchorDate: string; // ISO date of the close the band is derived from
  targetDate: string; // session the band applies to
  bandPct: number;
  precision: number;
}

export type BandResolution =
  | { available: true; band: PriceBand; anchorSource: 'prev_close' | 'close' }
  | { available: false; reason: string };

export type SessionPhase = 'pre_open' | 'intraday' | 'noon_break' | 'post_close';
export type PromptVariant = 'premarket' | 'noon_review';

export interface SessionInfo {
  phase: SessionPhase;
  timezone: string; // exchange zone the local fields are read in
  tradingDay: boolean;
  localDate: string;
  localTime: string; // HH:mm in exchange time
  targetDate: string;
  nextTradableDate: string;
  previousTradableDate: string;
  promptVariant: PromptVariant | null;
}

export type TradeSide = 'buy' | 'sell' | 'override';

export interface TradeEvent {
  id: string;
  symbol: string;
  timestamp: string; // ISO
  side: TradeSide;
  quantity: number;
  price: number;
  note?: string;
}

export interface Position {
  symbol: string;
  shares: number;
  baseShares: number; // locked tranche, never offered for sale
  costBasis: number; // verified cost basis per share
  averageCost: number; // weighted-average cost, used for realised P&L only
  realizedPnl: number;
  capitalAllocation: number;
  updatedAt: string;
}

export interface LedgerCheckpoint {
  symbol: string;
  seq: number; // number of events folded into `state`
  timestamp: string; // timestamp of the last folded event
  state: Position;
}

export interface Quote {
  symbol: string;
  price: number; // last trade, or the close once the session is over
  prevClose: number;
  volume: number;
  timestamp: string;
  name?: string;
}

export interface MinuteBar {
  timestamp: string; // ISO, exchange minute
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type AgentRole = 'quant' | 'intel' | 'commander' | 'auditor';

export type StageName =
  | 'draft.quant'
  | 'draft.intel'
  | 'draft'
  | 'audit1'
  | 'refine'
  | 'audit2'
  | 'final_order';

export interface StageOutput {
  stageName: StageName;
  role: AgentRole;
  modelTag: string;
  systemPrompt: string;
  userPrompt: string;
  rawOutput: string;
  timestamp: string;
}

export type Direction = 'buy' | 'sell' | 'hold';
export type OrderAction = 'buy' | 'sell' | 'hold' | 'abstain';

export interface Proposal {
  direction: Direction;
  quantity: number;
  limitPrice: number | null;
  stopLoss: number | null;
  commentary: string;
  adjustments: string[];
}

export interface AuditCritique {
  verdict: 'pass' | 'revise';
  issues: string[];
  summary: string;
}

export interface Refinement extends Proposal {
  stance: 'defend' | 'revise';
}

export interface FinalVerdict {
  verdict: 'accept' | 'reject';
  reason: string;
}

export interface FinalOrder {
  action: OrderAction;
  quantity: number;
  limitPrice: number | null;
  commentary: string;
  adjustments: string[];
}

export interface FinalDecision {
  direction: OrderAction;
  size: number;
  limitPrice: number | null;
  stopLoss: number | null;
  commentary: string;
  verdict: string;
}

export type DecisionStatus = 'completed' | 'rejected' | 'failed' | 'abandoned';

export interface BacktestScore {
  scoredAt: string;
  from: string;
  to: string;
  returnPct: number;
  userReturnPct: number;
}

export interface DecisionRecord {
  id: string;
  symbol: string;
  sessionType: SessionPhase;
  promptVariant: PromptVariant;
  modelTag: string;
  createdAt: string;
  targetDate: string;
  observationOnly: boolean;
  stageOutputs: StageOutput[];
  finalDecision: FinalDecision | null;
  status: DecisionStatus;
  failure?: { stage: string; reason: string };
  backtestScore?: BacktestScore;
}

export type IntelStatus = 'verified' | 'false_info' | 'pending';

export type IntelRecord =
  | { kind: 'claim'; id: string; timestamp: string; content: string; status: IntelStatus; source: string }
  | { kind: 'news'; id: string; timestamp: string; title: string; content: string; source: string }
  | { kind: 'note'; id: string; timestamp: string; content: string };
