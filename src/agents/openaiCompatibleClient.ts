import { AgentRole } from '../core/types';
import { AgentCallFailure, errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';
import { AgentClient } from './agentClient';
import { DispatchTable, bindingFor } from './dispatch';
import { StubAgentClient } from './stubAgentClient';

const log = createLogger('agent-client');

export interface OpenAICompatibleOptions {
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

const readContent = (json: unknown): string | undefined => {
  if (typeof json !== 'object' || json === null) return undefined;
  const choices: unknown = Reflect.get(json, 'choices');
  if (!Array.isArray(choices) || !choices.length) return undefined;
  const message: unknown = Reflect.get(Object(choices[0]), 'message');
  const content: unknown = message ? Reflect.get(Object(message), 'content') : undefined;
  return typeof content === 'string' ? content : undefined;
};

/** Chat-completions client for every provider that speaks the OpenAI wire format. */
export class OpenAICompatibleClient implements AgentClient {
  private table: DispatchTable;
  private options: OpenAICompatibleOptions;

  constructor(table: DispatchTable, options: OpenAICompatibleOptions) {
    this.table = table;
    this.options = options;
  }

  async invoke(role: AgentRole, modelTag: string, systemPrompt: string, userPrompt: string): Promise<string> {
    const binding = bindingFor(this.table, role);
    if (!binding) {
      throw new AgentCallFailure(role, 'no model bound to this role');
    }
    if (!binding.apiKey) {
      throw new AgentCallFailure(role, `missing API key (${binding.apiKeyEnv})`);
    }
    const doFetch = this.options.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const started = Date.now();
    try {
      const resp = await doFetch(`${binding.baseUrl.replace(/\/$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${binding.apiKey}`
        },
        body: JSON.stringify({
          model: binding.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt }
          ],
          temperature: this.options.temperature ?? 0.2,
          max_tokens: this.options.maxTokens ?? 2000
        }),
        signal: controller.signal
      });
      if (!resp.ok) {
        const text = await resp.text();
        throw new AgentCallFailure(role, `${binding.provider} error ${resp.status}: ${text.slice(0, 500)}`);
      }
      const content = readContent(await resp.json());
      if (!content || !content.trim()) {
        throw new AgentCallFailure(role, `${binding.provider} returned empty content`);
      }
      log.debug('Agent call completed', { role, modelTag, ms: Date.now() - started });
      return content;
    } catch (err) {
      if (err instanceof AgentCallFailure) throw err;
      if (controller.signal.aborted) {
        throw new AgentCallFailure(role, `timed out after ${this.options.timeoutMs}ms`);
      }
      throw new AgentCallFailure(role, errorMessage(err));
    } finally {
      clearTimeout(timer);
    }
  }
}

export const getAgentClient = (table: DispatchTable, options: OpenAICompatibleOptions): AgentClient => {
  if ((process.env.AGENT_CLIENT || '').toLowerCase() === 'stub') {
    log.warn('AGENT_CLIENT=stub; every stage gets a canned passive reply');
    return new StubAgentClient();
  }
  return new OpenAICompatibleClient(table, options);
};
