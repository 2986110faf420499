import { AgentCallFailure } from '../src/core/errors';
import { cleanAgentJson, draftSchema, finalOrderSchema, parseAgentJson, refineSchema } from '../src/agents/parsing';

describe('cleanAgentJson', () => {
  it('unwraps fenced replies', () => {
    expect(cleanAgentJson('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(cleanAgentJson('Sure:\n```\n{"a": 2}\n```\nDone.')).toBe('{"a": 2}');
  });

  it('cuts prose around the outermost braces', () => {
    expect(cleanAgentJson('Here you go: {"a": {"b": 2}} thanks')).toBe('{"a": {"b": 2}}');
    expect(cleanAgentJson('  nothing here ')).toBe('nothing here');
  });
});

describe('parseAgentJson', () => {
  it('coerces loose but unambiguous values', () => {
    const reply = parseAgentJson('{"direction": "SELL", "quantity": "300", "limitPrice": "10.5"}', draftSchema, 'draft');
    expect(reply).toEqual({ direction: 'sell', quantity: 300, limitPrice: 10.5, stopLoss: null, commentary: '' });
  });

  it('accepts abstain as a final action', () => {
    const reply = parseAgentJson('{"action": "Abstain", "quantity": 0, "limitPrice": null}', finalOrderSchema, 'final_order');
    expect(reply).toEqual({ action: 'abstain', quantity: 0, limitPrice: null, commentary: '' });
  });

  it('reports unparseable text as an agent failure', () => {
    expect(() => parseAgentJson('I would rather not say', draftSchema, 'draft')).toThrow(AgentCallFailure);
    expect(() => parseAgentJson('I would rather not say', draftSchema, 'draft')).toThrow(/^draft: reply is not valid JSON: /);
  });

  it('lists every validation issue with its path', () => {
    let caught: unknown;
    try {
      parseAgentJson('{"direction": "short", "quantity": -5}', draftSchema, 'draft');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AgentCallFailure);
    const message = caught instanceof Error ? caught.message : '';
    expect(message.startsWith('draft: reply failed validation: ')).toBe(true);
    expect(message).toContain('direction: Invalid enum value');
    expect(message).toContain('quantity: Number must be greater than or equal to 0');
  });

  it('requires a stance on refinements', () => {
    expect(() => parseAgentJson('{"direction": "hold", "quantity": 0}', refineSchema, 'refine')).toThrow(
      /^refine: reply failed validation: stance: /
    );
  });
});
