import { AgentRole } from '../core/types';

export interface AgentClient {
  /** Returns the raw text of the model's reply. Failures throw AgentCallFailure. */
  invoke(role: AgentRole, modelTag: string, systemPrompt: string, userPrompt: string): Promise<string>;
}
