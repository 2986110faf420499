import {
  AgentRole,
  AuditCritique,
  DecisionRecord,
  DecisionStatus,
  FinalDecision,
  FinalOrder,
  FinalVerdict,
  Proposal,
  Refinement,
  StageName,
  StageOutput
} from '../core/types';
import { InvalidTransitionError, errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';
import { makeId } from '../core/utils';
import { AgentClient } from '../agents/agentClient';
import { DispatchTable, SPECIALIST_ROLES } from '../agents/dispatch';
import { audit1Schema, audit2Schema, draftSchema, finalOrderSchema, parseAgentJson, refineSchema } from '../agents/parsing';
import { StrategyLog } from '../strategyLog/strategyLog';
import { ClampLimits, clampFinalOrder, clampProposal, limitsFromContext } from './clamp';
import { ContextDeps, ContextInput, DeliberationContext, buildDeliberationContext } from './context';
import {
  PromptPair,
  SpecialistReport,
  buildAudit1Prompt,
  buildAudit2Prompt,
  buildDraftPrompt,
  buildFinalOrderPrompt,
  buildRefinePrompt,
  buildSpecialistPrompt
} from './prompts';

const log = createLogger('deliberation');

export type PipelineStage = 'draft' | 'audit1' | 'refine' | 'audit2' | 'final_order';
export type RunState = 'idle' | PipelineStage | 'done' | 'failed' | 'rejected' | 'abandoned';

/** Stage each state leads to; terminal states lead nowhere. */
const NEXT_STAGE: Record<RunState, PipelineStage | null> = {
  idle: 'draft',
  draft: 'audit1',
  audit1: 'refine',
  refine: 'audit2',
  audit2: 'final_order',
  final_order: null,
  done: null,
  failed: null,
  rejected: null,
  abandoned: null
};

const TERMINAL: RunState[] = ['done', 'failed', 'rejected', 'abandoned'];

export interface RunSnapshot {
  id: string;
  symbol: string;
  state: RunState;
  nextStage: PipelineStage | null;
  observationOnly: boolean;
  targetDate: string;
  stageOutputs: StageOutput[];
  draft?: Proposal;
  audit1?: AuditCritique;
  refinement?: Refinement;
  verdict?: FinalVerdict;
  finalOrder?: FinalOrder;
  failure?: { stage: string; reason: string };
}

export interface RunDeps {
  client: AgentClient;
  dispatch: DispatchTable;
  strategyLog: StrategyLog;
  clock?: () => Date;
  idFactory?: () => string;
}

/**
 * One deliberation. `advance()` runs exactly one stage; `runToEnd()` loops it, so manual and
 * automatic drive share every stage function. State reports the last completed stage; a completed
 * final order moves the run straight to `done`. Terminal runs are logged once.
 */
export class DeliberationRun {
  readonly id: string;
  readonly context: DeliberationContext;
  readonly createdAt: string;
  private client: AgentClient;
  private dispatch: DispatchTable;
  private strategyLog: StrategyLog;
  private clock: () => Date;
  private limits: ClampLimits;
  private state: RunState = 'idle';
  private outputs: StageOutput[] = [];
  private draft?: Proposal;
  private audit1?: AuditCritique;
  private refinement?: Refinement;
  private verdict?: FinalVerdict;
  private finalOrder?: FinalOrder;
  private failure?: { stage: string; reason: string };
  private running = false;
  private record?: DecisionRecord;

  constructor(context: DeliberationContext, deps: RunDeps) {
    this.context = context;
    this.client = deps.client;
    this.dispatch = deps.dispatch;
    this.strategyLog = deps.strategyLog;
    this.clock = deps.clock ?? (() => new Date());
    this.id = (deps.idFactory ?? (() => makeId('run')))();
    this.createdAt = this.clock().toISOString();
    this.limits = limitsFromContext(context);
  }

  get currentState(): RunState {
    return this.state;
  }

  isTerminal(): boolean {
    return TERMINAL.includes(this.state);
  }

  snapshot(): RunSnapshot {
    return {
      id: this.id,
      symbol: this.context.symbol,
      state: this.state,
      nextStage: NEXT_STAGE[this.state],
      observationOnly: this.context.observationOnly,
      targetDate: this.context.session.targetDate,
      stageOutputs: this.outputs.slice(),
      ...(this.draft ? { draft: this.draft } : {}),
      ...(this.audit1 ? { audit1: this.audit1 } : {}),
      ...(this.refinement ? { refinement: this.refinement } : {}),
      ...(this.verdict ? { verdict: this.verdict } : {}),
      ...(this.finalOrder ? { finalOrder: this.finalOrder } : {}),
      ...(this.failure ? { failure: this.failure } : {})
    };
  }

  /** The logged record; undefined until the run is terminal. */
  decisionRecord(): DecisionRecord | undefined {
    return this.record;
  }

  async advance(): Promise<RunSnapshot> {
    const stage = NEXT_STAGE[this.state];
    if (!stage) {
      throw new InvalidTransitionError(`Run ${this.id} is ${this.state}; nothing left to advance`);
    }
    if (this.running) {
      throw new InvalidTransitionError(`Run ${this.id} is already running ${stage}`);
    }
    this.running = true;
    log.info('Stage started', { run: this.id, symbol: this.context.symbol, stage });
    try {
      await this.runStage(stage);
    } catch (err) {
      this.failure = { stage, reason: errorMessage(err) };
      this.state = 'failed';
      log.error('Stage failed', { run: this.id, stage, error: this.failure.reason });
    } finally {
      this.running = false;
    }
    if (this.isTerminal()) {
      this.finish();
    }
    return this.snapshot();
  }

  /** Stops the run between stages and logs whatever it produced so far. */
  abandon(reason = 'stopped by operator'): DecisionRecord {
    const stage = NEXT_STAGE[this.state];
    if (this.running) {
      throw new InvalidTransitionError(`Run ${this.id} is running ${stage ?? this.state}; wait for the stage to finish`);
    }
    if (!stage) {
      throw new InvalidTransitionError(`Run ${this.id} is already ${this.state}`);
    }
    this.failure = { stage, reason };
    this.state = 'abandoned';
    log.warn('Run abandoned', { run: this.id, before: stage });
    return this.finish();
  }

  async runToEnd(): Promise<DecisionRecord> {
    while (!this.isTerminal()) {
      await this.advance();
    }
    return this.finish();
  }

  private async runStage(stage: PipelineStage): Promise<void> {
    switch (stage) {
      case 'draft':
        this.draft = await this.runDraft();
        this.state = 'draft';
        return;
      case 'audit1':
        this.audit1 = await this.runAudit1(this.require(this.draft, 'draft'));
        this.state = 'audit1';
        return;
      case 'refine':
        this.refinement = await this.runRefine(this.require(this.draft, 'draft'), this.require(this.audit1, 'audit1'));
        this.state = 'refine';
        return;
      case 'audit2':
        this.verdict = await this.runAudit2(this.require(this.refinement, 'refine'));
        this.state = this.verdict.verdict === 'reject' ? 'rejected' : 'audit2';
        if (this.state === 'rejected') {
          log.warn('Plan rejected at final review', { run: this.id, reason: this.verdict.reason });
        }
        return;
      case 'final_order':
        this.finalOrder = await this.runFinalOrder();
        this.state = 'done';
        return;
      default: {
        const unknownStage: never = stage;
        throw new InvalidTransitionError(`Unknown stage ${String(unknownStage)}`);
      }
    }
  }

  private require<T>(value: T | undefined, stage: string): T {
    if (value === undefined) {
      throw new InvalidTransitionError(`Stage ${stage} has not produced a result`);
    }
    return value;
  }

  private async call(stageName: StageName, role: AgentRole, modelTag: string, prompt: PromptPair): Promise<string> {
    const raw = await this.client.invoke(role, modelTag, prompt.system, prompt.user);
    this.outputs.push({
      stageName,
      role,
      modelTag,
      systemPrompt: prompt.system,
      userPrompt: prompt.user,
      rawOutput: raw,
      timestamp: this.clock().toISOString()
    });
    return raw;
  }

  private async runDraft(): Promise<Proposal> {
    const roles = SPECIALIST_ROLES.filter((role) => this.dispatch[role]);
    if (roles.length < SPECIALIST_ROLES.length) {
      log.warn('Specialist roles not configured; drafting with fewer inputs', {
        run: this.id,
        missing: SPECIALIST_ROLES.filter((role) => !roles.includes(role))
      });
    }
    const prompts = roles.map((role) => buildSpecialistPrompt(role, this.context));
    const settled = await Promise.allSettled(
      roles.map((role, idx) => this.client.invoke(role, this.dispatch[role]?.modelTag ?? role, prompts[idx].system, prompts[idx].user))
    );

    const reports: SpecialistReport[] = [];
    settled.forEach((result, idx) => {
      const role = roles[idx];
      const modelTag = this.dispatch[role]?.modelTag ?? role;
      if (result.status === 'fulfilled') {
        this.outputs.push({
          stageName: role === 'quant' ? 'draft.quant' : 'draft.intel',
          role,
          modelTag,
          systemPrompt: prompts[idx].system,
          userPrompt: prompts[idx].user,
          rawOutput: result.value,
          timestamp: this.clock().toISOString()
        });
        reports.push({ role, available: true, text: result.value.trim() });
      } else {
        const reason = errorMessage(result.reason);
        log.warn('Specialist failed; commander drafts without it', { run: this.id, role, error: reason });
        reports.push({ role, available: false, reason });
      }
    });

    const commander = this.dispatch.commander;
    const raw = await this.call('draft', 'commander', commander.modelTag, buildDraftPrompt(this.context, reports));
    const parsed = parseAgentJson(raw, draftSchema, 'draft');
    return this.clampLogged('draft', clampProposal({ ...parsed }, this.limits));
  }

  private async runAudit1(draft: Proposal): Promise<AuditCritique> {
    const raw = await this.call('audit1', 'auditor', this.dispatch.auditor.modelTag, buildAudit1Prompt(this.context, draft));
    return parseAgentJson(raw, audit1Schema, 'audit1');
  }

  private async runRefine(draft: Proposal, audit: AuditCritique): Promise<Refinement> {
    const raw = await this.call('refine', 'commander', this.dispatch.commander.modelTag, buildRefinePrompt(this.context, draft, audit));
    const parsed = parseAgentJson(raw, refineSchema, 'refine');
    const clamped = this.clampLogged('refine', clampProposal(parsed, this.limits));
    return { ...clamped, stance: parsed.stance };
  }

  private async runAudit2(refinement: Refinement): Promise<FinalVerdict> {
    const raw = await this.call('audit2', 'auditor', this.dispatch.auditor.modelTag, buildAudit2Prompt(this.context, refinement));
    return parseAgentJson(raw, audit2Schema, 'audit2');
  }

  private async runFinalOrder(): Promise<FinalOrder> {
    const history = {
      draft: this.require(this.draft, 'draft'),
      audit1: this.require(this.audit1, 'audit1'),
      refinement: this.require(this.refinement, 'refine'),
      verdict: this.require(this.verdict, 'audit2')
    };
    const prompt = buildFinalOrderPrompt(this.context, history);
    const raw = await this.call('final_order', 'commander', this.dispatch.commander.modelTag, prompt);
    const parsed = parseAgentJson(raw, finalOrderSchema, 'final_order');
    const order = clampFinalOrder(parsed, this.limits);
    if (order.adjustments.length) {
      log.info('Final order clamped', { run: this.id, adjustments: order.adjustments });
    }
    return order;
  }

  private clampLogged(stage: string, proposal: Proposal): Proposal {
    if (proposal.adjustments.length) {
      log.info('Proposal clamped', { run: this.id, stage, adjustments: proposal.adjustments });
    }
    return proposal;
  }

  private buildFinalDecision(): FinalDecision | null {
    if (this.state !== 'done' || !this.finalOrder) return null;
    return {
      direction: this.finalOrder.action,
      size: this.finalOrder.quantity,
      limitPrice: this.finalOrder.limitPrice,
      stopLoss: this.refinement?.stopLoss ?? null,
      commentary: this.finalOrder.commentary,
      verdict: this.verdict ? `${this.verdict.verdict}: ${this.verdict.reason}` : ''
    };
  }

  private statusFor(): DecisionStatus {
    if (this.state === 'done') return 'completed';
    if (this.state === 'rejected') return 'rejected';
    if (this.state === 'abandoned') return 'abandoned';
    return 'failed';
  }

  private finish(): DecisionRecord {
    if (this.record) return this.record;
    const record: DecisionRecord = {
      id: this.id,
      symbol: this.context.symbol,
      sessionType: this.context.session.phase,
      promptVariant: this.context.promptVariant,
      modelTag: this.dispatch.commander.modelTag,
      createdAt: this.createdAt,
      targetDate: this.context.session.targetDate,
      observationOnly: this.context.observationOnly,
      stageOutputs: this.outputs.slice(),
      finalDecision: this.buildFinalDecision(),
      status: this.statusFor(),
      ...(this.failure ? { failure: this.failure } : {})
    };
    this.strategyLog.append(record);
    this.record = record;
    log.info('Run finished', { run: this.id, status: record.status });
    return record;
  }
}

export type StartDeps = ContextDeps & RunDeps;

export const startDeliberation = async (deps: StartDeps, input: ContextInput): Promise<DeliberationRun> => {
  const context = await buildDeliberationContext(deps, input);
  const run = new DeliberationRun(context, deps);
  log.info('Run started', {
    run: run.id,
    symbol: context.symbol,
    variant: context.promptVariant,
    targetDate: context.session.targetDate,
    observationOnly: context.observationOnly
  });
  return run;
};
