import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { readJSONFile } from './utils';

const roleBindingSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  modelTag: z.string().min(1)
});

const providerSchema = z.object({
  baseUrl: z.string().url(),
  apiKeyEnv: z.string().min(1)
});

export const deskConfigSchema = z.object({
  timezone: z.string().default('Asia/Shanghai'),
  holidaysFile: z.string().default('src/config/holidays.json'),
  dataDir: z.string().default('data'),
  totalCapital: z.number().positive(),
  checkpointInterval: z.number().int().positive().default(20),
  agentTimeoutMs: z.number().int().positive().default(120000),
  backtestInitialCapital: z.number().positive().default(100000),
  providers: z.record(providerSchema),
  roles: z.object({
    commander: roleBindingSchema,
    auditor: roleBindingSchema,
    quant: roleBindingSchema.optional(),
    intel: roleBindingSchema.optional()
  }),
  ui: z
    .object({
      port: z.number().int().nonnegative().default(8787),
      bind: z.string().default('127.0.0.1')
    })
    .default({ port: 8787, bind: '127.0.0.1' })
});

export type DeskConfig = z.infer<typeof deskConfigSchema>;
export type RoleBinding = z.infer<typeof roleBindingSchema>;
export type ProviderConfig = z.infer<typeof providerSchema>;

export const defaultConfigPath = () =>
  path.resolve(process.cwd(), process.env.DESK_CONFIG || 'src/config/default.json');

export const parseConfig = (raw: unknown): DeskConfig => {
  const result = deskConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid desk config: ${errors.join('; ')}`);
  }
  return result.data;
};

export const loadConfig = (configPath = defaultConfigPath()): DeskConfig => {
  const cfg = parseConfig(readJSONFile<unknown>(configPath));
  const timeout = Number(process.env.AGENT_TIMEOUT_MS);
  return {
    ...cfg,
    dataDir: process.env.DESK_DATA_DIR || cfg.dataDir,
    agentTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : cfg.agentTimeoutMs
  };
};

const holidaysSchema = z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/));

export const loadHolidays = (cfg: DeskConfig): Set<string> => {
  const file = path.resolve(process.cwd(), cfg.holidaysFile);
  if (!fs.existsSync(file)) {
    throw new Error(`Holiday calendar not found: ${file}`);
  }
  return new Set(holidaysSchema.parse(readJSONFile<unknown>(file)));
};
