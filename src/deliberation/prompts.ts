import { AgentRole, AuditCritique, FinalVerdict, PromptVariant, Proposal, Refinement, StageName } from '../core/types';
import { displayCost } from '../ledger/costBasis';
import { DeliberationContext } from './context';

export interface PromptPair {
  system: string;
  user: string;
}

export type SpecialistReport =
  | { role: 'quant' | 'intel'; available: true; text: string }
  | { role: 'quant' | 'intel'; available: false; reason: string };

const PERSONAS: Record<AgentRole, string> = {
  quant:
    'You are a quantitative analyst on an A-share trading desk. Read price, band and position figures with the minute-bar ' +
    'statistics and indicators, and report trend, flow, support and resistance, and where the band leaves room to act. ' +
    'Report facts and levels; do not issue orders.',
  intel:
    'You are an intelligence analyst on an A-share trading desk. Weigh the intelligence provided by its trust level: ' +
    'operator input outranks verified claims, claims marked false are ignored, unverified leads are only leads. ' +
    'Summarise what matters for the next session; do not issue orders.',
  commander:
    'You are the commander of a single-trader A-share desk. You own the decision. Combine the specialist reports with ' +
    'the exact position and band figures. Never sell base (locked) shares, never price outside the band, never buy ' +
    'beyond buying power.',
  auditor:
    'You are the adversarial risk auditor of the desk. Your job is to find what is wrong with the plan in front of you: ' +
    'arithmetic against the position, prices against the band, reasoning that ignores the intelligence, risk that is ' +
    'not bounded by a stop. Be specific. Approve only what survives scrutiny.'
};

const VARIANT_NOTES: Record<PromptVariant, string> = {
  premarket: 'Session: pre-market plan. The plan is for the target date; orders rest at the open.',
  noon_review: 'Session: midday review. The morning session is over; review it and plan the afternoon session.'
};

export const systemPromptFor = (role: AgentRole, variant: PromptVariant): string => `${PERSONAS[role]}\n\n${VARIANT_NOTES[variant]}`;

const money = (value: number) => value.toFixed(2);

export const renderContext = (ctx: DeliberationContext): string => {
  const { position, tradableShares, effectiveLimit, buyingPower } = ctx.exposure;
  const lines = [
    `Instrument: ${ctx.symbol} ${ctx.name} (${ctx.instrument.assetClass}, board ${ctx.instrument.board}, tick ${10 ** -ctx.instrument.precision})`,
    `Local time: ${ctx.session.localDate} ${ctx.session.localTime} (${ctx.session.phase}); target session ${ctx.session.targetDate}`
  ];
  if (ctx.quote) {
    lines.push(`Quote: last ${ctx.quote.price}, previous close ${ctx.quote.prevClose}, volume ${ctx.quote.volume}`);
  } else {
    lines.push('Quote: unavailable');
  }
  if (ctx.band.available) {
    const { band } = ctx.band;
    lines.push(
      `Price band for ${band.targetDate}: [${band.limitDown}, ${band.limitUp}] (${(band.bandPct * 100).toFixed(0)}% from ${band.anchorPrice} close of ${band.anchorDate})`
    );
  } else {
    lines.push(`Price band: UNAVAILABLE (${ctx.band.reason}). This run is observation-only; answer hold / abstain.`);
  }
  lines.push(
    `Position: ${position.shares} shares, base (locked) ${position.baseShares}, tradable ${tradableShares}, cost basis ${displayCost(position.costBasis)}`,
    `Capital: effective limit ${money(effectiveLimit)}, buying power ${money(buyingPower)}, realised P&L ${money(position.realizedPnl)}`
  );
  lines.push('', 'Intelligence:', ctx.intelText || '(none on file)');
  return lines.join('\n');
};

/** Minute-bar statistics for the quant specialist. */
export const renderTape = (ctx: DeliberationContext): string => {
  const { tape } = ctx;
  if (!tape) return 'Minute data: unavailable.';
  if (!tape.intraday) return `Minute data: no bars for ${tape.date}.`;
  const px = (value: number) => value.toFixed(ctx.instrument.precision);
  const pct = (value: number) => `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
  const day = tape.intraday;
  const lines = [
    `Minute data (${tape.date}, ${day.bars} bars):`,
    `  Session: open ${px(day.open)}, high ${px(day.high)} at ${day.highTime}, low ${px(day.low)} at ${day.lowTime}, last ${px(day.last)} (${pct(day.changePct)})`,
    `  VWAP ${px(day.vwap)}, last ${pct(day.lastVsVwapPct)} against it; morning volume ${day.morningVolumePct.toFixed(2)}%`
  ];
  const tech = tape.technicals;
  if (!tech) {
    lines.push('  Indicators: not enough bars.');
    return lines.join('\n');
  }
  lines.push(
    `  MA: MA5 ${px(tech.ma5)}, MA10 ${px(tech.ma10)}, MA20 ${px(tech.ma20)}`,
    `  RSI(14): ${tech.rsi14 === null ? 'n/a' : tech.rsi14.toFixed(2)}`,
    `  MACD: DIF ${tech.macd.dif.toFixed(3)}, DEA ${tech.macd.dea.toFixed(3)}, hist ${tech.macd.hist.toFixed(3)}`,
    `  KDJ: K ${tech.kdj.k.toFixed(1)}, D ${tech.kdj.d.toFixed(1)}, J ${tech.kdj.j.toFixed(1)}`,
    `  Bollinger(20, 2): upper ${px(tech.bollinger.upper)}, middle ${px(tech.bollinger.middle)}, lower ${px(tech.bollinger.lower)}`,
    `  Signals: ${tech.signals.length ? tech.signals.join('; ') : 'none'}`
  );
  return lines.join('\n');
};

const stageHeader = (stage: StageName) => `Stage: ${stage}`;

export const STAGE_HEADER = /^Stage: ([a-z0-9_.]+)/;

const PROPOSAL_CONTRACT =
  'Reply with one JSON object: {"direction": "buy" | "sell" | "hold", "quantity": <shares>, "limitPrice": <price or null>, ' +
  '"stopLoss": <price or null>, "commentary": "<reasoning>"}';

export const renderProposal = (proposal: Proposal): string => {
  const lines = [
    `${proposal.direction} ${proposal.quantity} @ ${proposal.limitPrice ?? 'n/a'}, stop ${proposal.stopLoss ?? 'n/a'}`,
    `Commentary: ${proposal.commentary || '(none)'}`
  ];
  if (proposal.adjustments.length) {
    lines.push(`Adjusted by desk limits: ${proposal.adjustments.join('; ')}`);
  }
  return lines.join('\n');
};

export const buildSpecialistPrompt = (role: 'quant' | 'intel', ctx: DeliberationContext): PromptPair => ({
  system: systemPromptFor(role, ctx.promptVariant),
  user: [
    stageHeader(role === 'quant' ? 'draft.quant' : 'draft.intel'),
    renderContext(ctx),
    ...(role === 'quant' ? ['', renderTape(ctx)] : []),
    '',
    'Write a short report (plain text, at most 300 words) for the commander.'
  ].join('\n')
});

const renderReports = (reports: SpecialistReport[]): string => {
  if (!reports.length) {
    return 'Specialist reports: none available. Decide from the figures above alone and say so.';
  }
  return reports
    .map((r) => (r.available ? `[${r.role} report]\n${r.text}` : `[${r.role} report] DATA UNAVAILABLE (${r.reason})`))
    .join('\n\n');
};

export const buildDraftPrompt = (ctx: DeliberationContext, reports: SpecialistReport[]): PromptPair => ({
  system: systemPromptFor('commander', ctx.promptVariant),
  user: [stageHeader('draft'), renderContext(ctx), '', renderReports(reports), '', 'Draft the plan.', PROPOSAL_CONTRACT].join('\n')
});

export const buildAudit1Prompt = (ctx: DeliberationContext, draft: Proposal): PromptPair => ({
  system: systemPromptFor('auditor', ctx.promptVariant),
  user: [
    stageHeader('audit1'),
    renderContext(ctx),
    '',
    'Commander draft:',
    renderProposal(draft),
    '',
    'Audit the draft. Reply with one JSON object: {"verdict": "pass" | "revise", "issues": ["<issue>", ...], "summary": "<one paragraph>"}'
  ].join('\n')
});

export const buildRefinePrompt = (ctx: DeliberationContext, draft: Proposal, audit: AuditCritique): PromptPair => ({
  system: systemPromptFor('commander', ctx.promptVariant),
  user: [
    stageHeader('refine'),
    renderContext(ctx),
    '',
    'Your draft:',
    renderProposal(draft),
    '',
    `Audit verdict: ${audit.verdict}`,
    ...audit.issues.map((issue) => `- ${issue}`),
    `Summary: ${audit.summary || '(none)'}`,
    '',
    'Defend the draft or revise it. Reply with the proposal JSON plus "stance": "defend" | "revise".',
    PROPOSAL_CONTRACT
  ].join('\n')
});

export const buildAudit2Prompt = (ctx: DeliberationContext, refinement: Refinement): PromptPair => ({
  system: systemPromptFor('auditor', ctx.promptVariant),
  user: [
    stageHeader('audit2'),
    renderContext(ctx),
    '',
    `Commander's refined plan (${refinement.stance}):`,
    renderProposal(refinement),
    '',
    'Final review. Reply with one JSON object: {"verdict": "accept" | "reject", "reason": "<why>"}'
  ].join('\n')
});

export interface FinalOrderHistory {
  draft: Proposal;
  audit1: AuditCritique;
  refinement: Refinement;
  verdict: FinalVerdict;
}

export const buildFinalOrderPrompt = (ctx: DeliberationContext, history: FinalOrderHistory): PromptPair => ({
  system: systemPromptFor('commander', ctx.promptVariant),
  user: [
    stageHeader('final_order'),
    renderContext(ctx),
    '',
    '[Step 1: draft]',
    renderProposal(history.draft),
    '[Step 2: audit]',
    `${history.audit1.verdict}: ${history.audit1.summary}`,
    '[Step 3: refinement]',
    renderProposal(history.refinement),
    '[Step 4: verdict]',
    `${history.verdict.verdict}: ${history.verdict.reason}`,
    '',
    'Issue the order for the target session. Reply with one JSON object: {"action": "buy" | "sell" | "hold" | "abstain", ' +
      '"quantity": <shares>, "limitPrice": <price or null>, "commentary": "<instructions>"}'
  ].join('\n')
});
