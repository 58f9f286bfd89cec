import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './runReport.js';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  LEAGUE_OPERATOR: z.preprocess(blankToUndefined, z.string().trim().optional()),
  LEAGUE_DATA_DIR: z.preprocess(blankToUndefined, z.string().default('data')),
  LEAGUE_CONFIG_DIR: z.preprocess(blankToUndefined, z.string().default('config')),
  LEAGUE_WEB_DIR: z.preprocess(blankToUndefined, z.string().default('web')),
  APOLLO_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(4100)),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(4173)),
  USE_CSV: z.preprocess(blankToUndefined, z.enum(['0', '1']).default('0')),
});

export interface AppConfig {
  /** Nickname of the operator who co-manages teams; never the manager of record. */
  operator?: string;
  dataDir: string;
  configDir: string;
  webDir: string;
  snapshotDir: string;
  historyFile: string;
  historyCsvFile: string;
  h2hFile: string;
  identitiesFile: string;
  apolloPort: number;
  port: number;
  useCsv: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const dataDir = path.resolve(cwd, e.LEAGUE_DATA_DIR);
  const configDir = path.resolve(cwd, e.LEAGUE_CONFIG_DIR);
  return {
    operator: e.LEAGUE_OPERATOR,
    dataDir,
    configDir,
    webDir: path.resolve(cwd, e.LEAGUE_WEB_DIR),
    snapshotDir: path.join(dataDir, 'snapshots'),
    historyFile: path.join(dataDir, 'historical_data.json'),
    historyCsvFile: path.join(dataDir, 'historical_data.csv'),
    h2hFile: path.join(dataDir, 'h2h_records.json'),
    identitiesFile: path.join(configDir, 'identities.json'),
    apolloPort: e.APOLLO_PORT,
    port: e.PORT,
    useCsv: e.USE_CSV === '1',
  };
}
