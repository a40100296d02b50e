import 'dotenv/config';
import { cosmiconfig } from 'cosmiconfig';
import { ConfigSchema, type Config } from '../models/config.model.js';

type RawConfig = Record<string, unknown>;

export type ConfigOverrides = {
  settings?: Partial<Config['settings']>;
  cleanups?: Partial<Config['cleanups']>;
  activity?: Partial<Config['activity']>;
};

export async function loadConfig(overrides: ConfigOverrides = {}): Promise<Config> {
  const explorer = cosmiconfig('dirtidy');
  const result = await explorer.search();

  const found: unknown = result?.config;
  const raw: RawConfig = isRecord(found) ? found : {};

  // Merge env vars
  const env: RawConfig = {};
  if (process.env.DIRTIDY_SETTINGS_PATH) {
    env.settings = { path: process.env.DIRTIDY_SETTINGS_PATH };
  }
  // Not $SHELL: command lines are quoted for a POSIX shell
  if (process.env.DIRTIDY_SHELL) {
    env.cleanups = { shell: process.env.DIRTIDY_SHELL };
  }

  // Explicit config wins over env, CLI overrides win over both
  const merged = deepMerge(deepMerge(env, raw), overrides);

  return ConfigSchema.parse(merged);
}

export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const val = source[key];
    if (val !== undefined && val !== null && val !== '') {
      const existing = result[key];
      if (isRecord(val) && isRecord(existing)) {
        result[key] = deepMerge(existing, val);
      } else {
        result[key] = val;
      }
    }
  }
  return result;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
