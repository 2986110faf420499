import { AgentRole } from '../core/types';
import { DeskConfig, RoleBinding } from '../core/config';

export interface ResolvedBinding {
  role: AgentRole;
  provider: string;
  baseUrl: string;
  model: string;
  modelTag: string;
  apiKeyEnv: string;
  apiKey?: string;
}

export type DispatchTable = {
  commander: ResolvedBinding;
  auditor: ResolvedBinding;
  quant?: ResolvedBinding;
  intel?: ResolvedBinding;
};

export type SpecialistRole = 'quant' | 'intel';
export const SPECIALIST_ROLES: SpecialistRole[] = ['quant', 'intel'];

const bind = (
  role: AgentRole,
  binding: RoleBinding,
  config: DeskConfig,
  env: Record<string, string | undefined>
): ResolvedBinding => {
  const provider = config.providers[binding.provider];
  if (!provider) {
    throw new Error(`Role ${role} references unknown provider "${binding.provider}"`);
  }
  return {
    role,
    provider: binding.provider,
    baseUrl: provider.baseUrl,
    model: binding.model,
    modelTag: binding.modelTag,
    apiKeyEnv: provider.apiKeyEnv,
    apiKey: env[provider.apiKeyEnv]
  };
};

/**
 * Resolves `role -> provider` once per run. Roles left out of the configuration are absent from the
 * table; a missing specialist means that branch is skipped.
 */
export const resolveDispatch = (config: DeskConfig, env: Record<string, string | undefined> = process.env): DispatchTable => {
  const { roles } = config;
  const table: DispatchTable = {
    commander: bind('commander', roles.commander, config, env),
    auditor: bind('auditor', roles.auditor, config, env)
  };
  if (roles.quant) table.quant = bind('quant', roles.quant, config, env);
  if (roles.intel) table.intel = bind('intel', roles.intel, config, env);
  return table;
};

export const bindingFor = (table: DispatchTable, role: AgentRole): ResolvedBinding | undefined => table[role];
