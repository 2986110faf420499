import { z } from 'zod';
import {
  DataUnavailableError,
  DeliberationBlockedError,
  InvalidInstrumentError,
  InvalidTransitionError,
  LedgerInvariantViolation,
  errorMessage
} from '../core/errors';
import { createLogger } from '../core/logger';
import { parseTimestamp } from '../core/time';
import { Desk } from '../desk';
import { RunRegistry } from '../deliberation/runRegistry';
import { startDeliberation } from '../deliberation/pipeline';
import { classifyInstrument, normalizeSymbol } from '../market/instrument';
import { resolveBand } from '../market/priceLimits';

const log = createLogger('api');

export interface ApiResult {
  status: number;
  body: unknown;
}

const ok = (body: unknown, status = 200): ApiResult => ({ status, body });

const invalid = (issues: z.ZodIssue[]): ApiResult => ({
  status: 400,
  body: { error: issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ') }
});

const notFound = (what: string): ApiResult => ({ status: 404, body: { error: `${what} not found` } });

export const statusForError = (err: unknown): number => {
  if (err instanceof InvalidInstrumentError) return 400;
  if (err instanceof LedgerInvariantViolation) return 409;
  if (err instanceof DeliberationBlockedError || err instanceof InvalidTransitionError) return 409;
  if (err instanceof DataUnavailableError) return 503;
  return 500;
};

const failure = (err: unknown): ApiResult => {
  const status = statusForError(err);
  if (status === 500) {
    log.error('Request failed', { error: errorMessage(err) });
  }
  return { status, body: { error: errorMessage(err) } };
};

const timestampSchema = z.string().refine((v) => !Number.isNaN(new Date(v).getTime()), 'not a valid timestamp');

const tradeSchema = z.object({
  symbol: z.string().min(1),
  side: z.enum(['buy', 'sell', 'override']),
  quantity: z.number(),
  price: z.number(),
  timestamp: timestampSchema.optional(),
  note: z.string().optional()
});

const baseSchema = z.object({ baseShares: z.number() });
const allocationSchema = z.object({ amount: z.number() });

const startRunSchema = z.object({
  symbol: z.string().min(1),
  mode: z.enum(['manual', 'auto']).default('manual'),
  asof: timestampSchema.optional(),
  name: z.string().optional(),
  intel: z.unknown().optional()
});

/**
 * Request handling without HTTP: every method returns a status and a JSON body, and never throws.
 * routes.ts binds these to express paths.
 */
export class DeskApi {
  private desk: Desk;
  private runs: RunRegistry;
  private clock: () => Date;

  constructor(desk: Desk, runs: RunRegistry = new RunRegistry(), clock: () => Date = () => new Date()) {
    this.desk = desk;
    this.runs = runs;
    this.clock = clock;
  }

  private async guard(fn: () => Promise<ApiResult> | ApiResult): Promise<ApiResult> {
    try {
      return await fn();
    } catch (err) {
      return failure(err);
    }
  }

  session(): Promise<ApiResult> {
    return this.guard(() => ok(this.desk.classifier.classify(this.clock())));
  }

  positions(): Promise<ApiResult> {
    return this.guard(() =>
      ok(
        this.desk.ledger.listPositions().map((position) => ({
          ...position,
          tradableShares: position.shares - position.baseShares,
          effectiveLimit: this.desk.ledger.effectiveLimit(position.symbol)
        }))
      )
    );
  }

  position(symbol: string): Promise<ApiResult> {
    return this.guard(() => {
      const position = this.desk.ledger.getPosition(symbol);
      return ok({
        ...position,
        tradableShares: this.desk.ledger.tradableShares(symbol),
        effectiveLimit: this.desk.ledger.effectiveLimit(symbol),
        history: this.desk.ledger.history(symbol)
      });
    });
  }

  recordTrade(body: unknown): Promise<ApiResult> {
    return this.guard(async () => {
      const parsed = tradeSchema.safeParse(body);
      if (!parsed.success) return invalid(parsed.error.issues);
      const position = await this.desk.ledger.applyTrade(parsed.data);
      return ok(position, 201);
    });
  }

  setBaseShares(symbol: string, body: unknown): Promise<ApiResult> {
    return this.guard(async () => {
      const parsed = baseSchema.safeParse(body);
      if (!parsed.success) return invalid(parsed.error.issues);
      return ok(await this.desk.ledger.setBaseShares(symbol, parsed.data.baseShares));
    });
  }

  setAllocation(symbol: string, body: unknown): Promise<ApiResult> {
    return this.guard(async () => {
      const parsed = allocationSchema.safeParse(body);
      if (!parsed.success) return invalid(parsed.error.issues);
      return ok(await this.desk.ledger.setCapitalAllocation(symbol, parsed.data.amount));
    });
  }

  band(symbol: string, name?: string): Promise<ApiResult> {
    return this.guard(async () => {
      const instrument = classifyInstrument(symbol, { name });
      const session = this.desk.classifier.classify(this.clock());
      const resolution = await resolveBand(instrument, session, this.desk.quotes);
      return ok({ instrument, session: { phase: session.phase, targetDate: session.targetDate }, ...resolution });
    });
  }

  startRun(body: unknown): Promise<ApiResult> {
    return this.guard(async () => {
      const parsed = startRunSchema.safeParse(body);
      if (!parsed.success) return invalid(parsed.error.issues);
      const { symbol, mode, asof, name, intel } = parsed.data;
      const now = asof ? new Date(parseTimestamp(asof)) : this.clock();
      const clock = asof ? () => now : this.clock;
      const run = this.runs.add(await startDeliberation({ ...this.desk, clock }, { symbol, now, name, intel }));
      if (mode === 'auto') {
        await run.runToEnd();
      }
      this.runs.release(run);
      return ok(run.snapshot(), 201);
    });
  }

  advanceRun(id: string): Promise<ApiResult> {
    return this.guard(async () => {
      const run = this.runs.get(id);
      if (!run) return notFound(`Run ${id}`);
      const snapshot = await run.advance();
      this.runs.release(run);
      return ok(snapshot);
    });
  }

  autoRun(id: string): Promise<ApiResult> {
    return this.guard(async () => {
      const run = this.runs.get(id);
      if (!run) return notFound(`Run ${id}`);
      await run.runToEnd();
      this.runs.release(run);
      return ok(run.snapshot());
    });
  }

  abandonRun(id: string): Promise<ApiResult> {
    return this.guard(() => {
      const run = this.runs.get(id);
      if (!run) return notFound(`Run ${id}`);
      const record = run.abandon();
      this.runs.release(run);
      return ok(record);
    });
  }

  getRun(id: string): Promise<ApiResult> {
    return this.guard(() => {
      const run = this.runs.get(id);
      if (run) return ok(run.snapshot());
      const record = this.desk.strategyLog.get(id);
      return record ? ok(record) : notFound(`Run ${id}`);
    });
  }

  decisions(symbol?: string): Promise<ApiResult> {
    return this.guard(() => ok(this.desk.strategyLog.list(symbol ? normalizeSymbol(symbol) : undefined)));
  }
}
