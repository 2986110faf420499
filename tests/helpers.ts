import { AgentRole, DecisionRecord, MinuteBar, Quote } from '../src/core/types';
import { DataUnavailableError } from '../src/core/errors';
import { AgentClient } from '../src/agents/agentClient';
import { DispatchTable, ResolvedBinding } from '../src/agents/dispatch';
import { QuoteProvider } from '../src/data/marketData.types';
import { STAGE_HEADER } from '../src/deliberation/prompts';
import { SessionClassifier } from '../src/market/session';

export class StaticQuoteProvider implements QuoteProvider {
  private quotes = new Map<string, Quote>();
  private bars = new Map<string, MinuteBar[]>();

  setQuote(quote: Quote): this {
    this.quotes.set(quote.symbol, quote);
    return this;
  }

  setBars(symbol: string, date: string, bars: MinuteBar[]): this {
    this.bars.set(`${symbol}:${date}`, bars);
    return this;
  }

  async getQuote(symbol: string): Promise<Quote> {
    const quote = this.quotes.get(symbol);
    if (!quote) throw new DataUnavailableError(symbol, 'no quote in fixture');
    return quote;
  }

  async getMinuteBars(symbol: string, date: string): Promise<MinuteBar[]> {
    return this.bars.get(`${symbol}:${date}`) ?? [];
  }
}

export type ScriptedReply = string | Error;

export interface AgentCall {
  role: AgentRole;
  modelTag: string;
  stage: string;
  systemPrompt: string;
  userPrompt: string;
}

/** Replies by the stage named on the first line of the user prompt. */
export class ScriptedAgentClient implements AgentClient {
  readonly calls: AgentCall[] = [];
  private replies: Record<string, ScriptedReply>;

  constructor(replies: Record<string, ScriptedReply>) {
    this.replies = replies;
  }

  async invoke(role: AgentRole, modelTag: string, systemPrompt: string, userPrompt: string): Promise<string> {
    const stage = STAGE_HEADER.exec(userPrompt)?.[1] ?? '';
    this.calls.push({ role, modelTag, stage, systemPrompt, userPrompt });
    const reply = this.replies[stage];
    if (reply === undefined) throw new Error(`no scripted reply for ${stage}`);
    if (reply instanceof Error) throw reply;
    return reply;
  }

  callFor(stage: string): AgentCall | undefined {
    return this.calls.find((c) => c.stage === stage);
  }
}

const binding = (role: AgentRole, modelTag: string): ResolvedBinding => ({
  role,
  provider: 'test',
  baseUrl: 'http://localhost.invalid/v1',
  model: modelTag,
  modelTag,
  apiKeyEnv: 'TEST_API_KEY',
  apiKey: 'test-secret'
});

export const makeDispatch = (withSpecialists = true): DispatchTable => ({
  commander: binding('commander', 'commander-model'),
  auditor: binding('auditor', 'auditor-model'),
  ...(withSpecialists ? { quant: binding('quant', 'quant-model'), intel: binding('intel', 'intel-model') } : {})
});

export const makeClassifier = (holidays: string[] = []) => new SessionClassifier({ timezone: 'Asia/Shanghai', holidays });

/** Monday 2025-03-03 08:30 in Shanghai: pre-open on a trading day. */
export const PRE_OPEN = new Date('2025-03-03T00:30:00Z');

export const HAPPY_SCRIPT: Record<string, ScriptedReply> = {
  'draft.quant': 'Range 9.6 to 10.8; momentum flat.',
  'draft.intel': 'No material news.',
  draft: '```json\n{"direction": "sell", "quantity": 700, "limitPrice": 10.8, "stopLoss": 9.2, "commentary": "Trim into strength."}\n```',
  audit1: '{"verdict": "revise", "issues": ["Size leans on the locked tranche"], "summary": "Reduce to tradable."}',
  refine: '{"stance": "revise", "direction": "sell", "quantity": 600, "limitPrice": 10.8, "stopLoss": 9.2, "commentary": "Sell the tradable tranche."}',
  audit2: '{"verdict": "accept", "reason": "Within limits."}',
  final_order: '{"action": "sell", "quantity": 600, "limitPrice": 10.8, "commentary": "Sell 600 at 10.80."}'
};

/** A completed decision record; override what the test cares about. */
export const decision = (overrides: Partial<DecisionRecord> = {}): DecisionRecord => ({
  id: 'dec-1',
  symbol: '600000',
  sessionType: 'pre_open',
  promptVariant: 'premarket',
  modelTag: 'model-a',
  createdAt: '2025-03-02T12:00:00Z',
  targetDate: '2025-03-03',
  observationOnly: false,
  stageOutputs: [],
  finalDecision: { direction: 'hold', size: 0, limitPrice: null, stopLoss: null, commentary: '', verdict: 'accept: ok' },
  status: 'completed',
  ...overrides
});

/** `count` one-minute bars from 09:30 whose close climbs by `step`, high and low half a cent around it. */
export const risingBars = (date: string, count: number, start = 10, step = 0.01): MinuteBar[] =>
  Array.from({ length: count }, (_, i) => {
    const minute = 9 * 60 + 30 + i;
    const clock = `${String(Math.floor(minute / 60)).padStart(2, '0')}:${String(minute % 60).padStart(2, '0')}`;
    const close = start + step * i;
    return { timestamp: `${date}T${clock}:00+08:00`, open: close, high: close + 0.005, low: close - 0.005, close, volume: 100 };
  });
