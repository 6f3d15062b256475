import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ledgerConfigSchema = z.object({
  dbPath: z.string().min(1),
  ownerId: z.string().min(1),
  modelVersion: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
  logPretty: z.boolean(),
}).strict();

export type LedgerConfig = z.infer<typeof ledgerConfigSchema>;

export const DEFAULT_CONFIG: LedgerConfig = {
  dbPath: './data/ledger.db',
  ownerId: 'owner',
  modelVersion: 1,
  logLevel: 'info',
  logPretty: false,
};

const DEFAULT_FILE = path.resolve(process.cwd(), 'config', 'ledger.json');
let cfg: LedgerConfig | null = null;

export function isTestEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
  return !!(env.JEST_WORKER_ID || env.NODE_ENV === 'test');
}

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

function readFileSection(file: string): Partial<LedgerConfig> {
  if (!fs.existsSync(file)) return {};
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return ledgerConfigSchema.partial().parse(raw);
}

function parseFlag(v: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
}

function readEnvSection(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.LEDGER_DB_PATH) out.dbPath = env.LEDGER_DB_PATH;
  if (env.LEDGER_OWNER_ID) out.ownerId = env.LEDGER_OWNER_ID;
  if (env.LEDGER_MODEL_VERSION) out.modelVersion = Number(env.LEDGER_MODEL_VERSION);
  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL;
  if (env.LOG_PRETTY) out.logPretty = parseFlag(env.LOG_PRETTY);
  return out;
}

/**
 * Defaults, then config/ledger.json, then environment. The merged result is
 * validated as a whole so a bad env value fails loudly at startup.
 */
export function loadConfig(opts: { file?: string; env?: NodeJS.ProcessEnv } = {}): LedgerConfig {
  const fromFile = readFileSection(opts.file ?? DEFAULT_FILE);
  const fromEnv = readEnvSection(opts.env ?? process.env);
  return ledgerConfigSchema.parse({ ...DEFAULT_CONFIG, ...fromFile, ...fromEnv });
}

export function getConfig(): LedgerConfig {
  if (!cfg) cfg = loadConfig();
  return cfg;
}
