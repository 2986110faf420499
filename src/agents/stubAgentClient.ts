import { AgentRole } from '../core/types';
import { STAGE_HEADER } from '../deliberation/prompts';
import { AgentClient } from './agentClient';

const CANNED: Record<string, unknown> = {
  draft: { direction: 'hold', quantity: 0, limitPrice: null, stopLoss: null, commentary: 'Stub commander: no view, hold.' },
  audit1: { verdict: 'pass', issues: [], summary: 'Stub auditor: nothing to object to in a hold.' },
  refine: { stance: 'defend', direction: 'hold', quantity: 0, limitPrice: null, stopLoss: null, commentary: 'Stub commander: holding.' },
  audit2: { verdict: 'accept', reason: 'Stub auditor: hold accepted.' },
  final_order: { action: 'hold', quantity: 0, limitPrice: null, commentary: 'Stub commander: no order.' }
};

/** Offline stand-in: a passive, well-formed reply for every stage. Selected with AGENT_CLIENT=stub. */
export class StubAgentClient implements AgentClient {
  async invoke(role: AgentRole, modelTag: string, _systemPrompt: string, userPrompt: string): Promise<string> {
    const stage = STAGE_HEADER.exec(userPrompt)?.[1] ?? '';
    if (stage.startsWith('draft.')) {
      return `Stub ${role} report (${modelTag}): no data source attached.`;
    }
    const reply = CANNED[stage];
    if (!reply) {
      throw new Error(`Stub agent has no reply for stage "${stage}"`);
    }
    return JSON.stringify(reply);
  }
}
