import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_JOB_SITES } from './search/sites';

dotenv.config();

const appConfigSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).default('job_search.db'),
    })
    .default({}),
  search: z
    .object({
      defaultJobSites: z.array(z.string().min(1)).min(1).default([...DEFAULT_JOB_SITES]),
      resultsPerQuery: z.number().int().min(1).max(10).default(10),
      requestTimeoutMs: z.number().int().positive().default(15000),
    })
    .default({}),
  scheduler: z
    .object({
      maxConcurrentRuns: z.number().int().min(1).default(4),
    })
    .default({}),
  mail: z
    .object({
      fromAddress: z.string().min(1).optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SearchSettings = AppConfig['search'];
export type SchedulerSettings = AppConfig['scheduler'];

function configPath(): string {
  return path.resolve(process.cwd(), process.env.CONFIG_PATH || 'config.json');
}

export function parseConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

function loadConfigFromDisk(): AppConfig {
  const file = configPath();
  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const config = parseConfig(raw);
  if (process.env.DATABASE_PATH) {
    config.database.path = process.env.DATABASE_PATH;
  }
  return config;
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfigFromDisk();
  }
  return currentConfig;
}

export function reloadConfig(): AppConfig {
  currentConfig = loadConfigFromDisk();
  return currentConfig;
}

export function getResendKey(): string | null {
  return process.env.RESEND_API_KEY || null;
}
