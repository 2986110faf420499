import { z } from 'zod';
import { AgentCallFailure, errorMessage } from '../core/errors';

/** Strips a ```json fence, or failing that any prose around the outermost braces. */
export const cleanAgentJson = (raw: string): string => {
  const trimmed = raw.trim();
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch && fenceMatch[1]) {
    return fenceMatch[1].trim();
  }
  const first = trimmed.indexOf('{');
  const last = trimmed.lastIndexOf('}');
  if (first >= 0 && last > first) {
    return trimmed.slice(first, last + 1);
  }
  return trimmed;
};

export const parseAgentJson = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, stage: string): T => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanAgentJson(raw));
  } catch (err) {
    throw new AgentCallFailure(stage, `reply is not valid JSON: ${errorMessage(err)}`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AgentCallFailure(stage, `reply failed validation: ${errors.join('; ')}`);
  }
  return result.data;
};

const lower = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const numeric = z.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);

const price = z
  .union([numeric, z.null()])
  .optional()
  .transform((v) => (v === undefined ? null : v));

const quantity = numeric.pipe(z.number().nonnegative());

export const draftSchema = z.object({
  direction: z.preprocess(lower, z.enum(['buy', 'sell', 'hold'])),
  quantity,
  limitPrice: price,
  stopLoss: price,
  commentary: z.string().default('')
});

export const audit1Schema = z.object({
  verdict: z.preprocess(lower, z.enum(['pass', 'revise'])),
  issues: z.array(z.string()).default([]),
  summary: z.string().default('')
});

export const refineSchema = draftSchema.extend({
  stance: z.preprocess(lower, z.enum(['defend', 'revise']))
});

export const audit2Schema = z.object({
  verdict: z.preprocess(lower, z.enum(['accept', 'reject'])),
  reason: z.string().default('')
});

export const finalOrderSchema = z.object({
  action: z.preprocess(lower, z.enum(['buy', 'sell', 'hold', 'abstain'])),
  quantity,
  limitPrice: price,
  commentary: z.string().default('')
});

export type DraftReply = z.output<typeof draftSchema>;
export type Audit1Reply = z.output<typeof audit1Schema>;
export type RefineReply = z.output<typeof refineSchema>;
export type Audit2Reply = z.output<typeof audit2Schema>;
export type FinalOrderReply = z.output<typeof finalOrderSchema>;
