import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, normalizeError } from '../utils/errors.js';

export const tableConfigSchema = z.object({
  decks: z.number().int().min(1).max(8),
  reshuffleThreshold: z.number().gt(0).lt(1),
  dealerStandsOn: z.number().int().min(12).max(21),
  startingBalance: z.number().int().positive(),
  topUp: z.number().int().positive(),
  seed: z.number().int().optional(),
}).strict();

export type TableConfig = z.infer<typeof tableConfigSchema>;

export const DEFAULT_TABLE_CONFIG: TableConfig = {
  decks: 6,
  reshuffleThreshold: 0.2,
  dealerStandsOn: 17,
  startingBalance: 100,
  topUp: 50,
};

const ENV_KEYS = {
  decks: 'BLACKJACK_DECKS',
  reshuffleThreshold: 'BLACKJACK_RESHUFFLE_THRESHOLD',
  dealerStandsOn: 'BLACKJACK_DEALER_STANDS_ON',
  startingBalance: 'BLACKJACK_STARTING_BALANCE',
  topUp: 'BLACKJACK_TOP_UP',
  seed: 'BLACKJACK_SEED',
} as const satisfies Record<keyof TableConfig, string>;

export function defaultConfigFile(): string {
  return path.resolve(process.cwd(), 'config', 'blackjack.json');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function readFileLayer(file: string | null): Record<string, unknown> {
  if (!file || !fs.existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`${file} is not valid JSON`, [normalizeError(e).message]);
  }
  if (!isRecord(parsed)) throw new ConfigError(`${file} must hold a JSON object`);
  return parsed;
}

function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const n = Number(raw);
    // keep the raw string so zod names the bad key
    out[key] = Number.isFinite(n) ? n : raw;
  }
  return out;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON file to read; `null` skips the file layer. */
  file?: string | null;
}

/** defaults ← config file ← environment */
export function loadTableConfig(opts: LoadConfigOptions = {}): TableConfig {
  const env = opts.env ?? process.env;
  const file = opts.file === undefined ? defaultConfigFile() : opts.file;
  const merged = { ...DEFAULT_TABLE_CONFIG, ...readFileLayer(file), ...envLayer(env) };
  const res = tableConfigSchema.safeParse(merged);
  if (!res.success) {
    throw new ConfigError(
      'invalid table config',
      res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return res.data;
}
