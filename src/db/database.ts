import Database from 'better-sqlite3';
import { z } from 'zod';
import { PersistenceError } from '../errors';
import { createLogger } from '../logger';
import { cadenceSchema } from '../schedule/cadence';
import { DEFAULT_LOCATION_FILTER, DEFAULT_MAX_JOB_AGE, searchLogicSchema, type NewSearchConfig } from '../search-config';
import type { JobPosting, SearchConfig, UserCredentialView } from '../types';
import type { Storage } from './storage';

const log = createLogger('DB');

interface UserRow {
  id: number;
  email: string;
  name: string | null;
  notification_email: string | null;
  search_credentials: string | null;
  mail_credentials: string | null;
}

interface ConfigRow {
  id: number;
  user_id: number;
  name: string;
  keywords: string;
  search_logic: string | null;
  custom_logic: string | null;
  cadence: string;
  location_filter: string | null;
  job_sites: string | null;
  max_job_age: number | null;
  is_active: number;
  last_run: string | null;
}

interface PostingRow {
  id: number;
  user_id: number;
  search_config_id: number | null;
  title: string;
  link: string;
  snippet: string | null;
  job_site: string | null;
  keyword: string | null;
  company: string | null;
  is_test: number;
  found_at: string;
}

export interface StoredPosting extends JobPosting {
  id: number;
  configId: number | null;
  isTest: boolean;
}

export interface NewUser {
  email: string;
  name?: string;
  notificationEmail?: string | null;
  searchCredentials?: { apiKey: string; engineId: string } | null;
  /** Opaque mail credential blob; its presence marks the user as mail-capable. */
  mailCredentials?: string | null;
}

const searchCredentialsSchema = z.object({
  apiKey: z.string().default(''),
  engineId: z.string().default(''),
});

const stringListSchema = z.array(z.string());

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT NOT NULL UNIQUE,
    name TEXT,
    notification_email TEXT,
    search_credentials TEXT,
    mail_credentials TEXT,
    created_at TEXT DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS search_configs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    keywords TEXT NOT NULL,
    search_logic TEXT DEFAULT 'AND',
    custom_logic TEXT DEFAULT '',
    cadence TEXT NOT NULL,
    location_filter TEXT,
    job_sites TEXT DEFAULT '[]',
    max_job_age INTEGER DEFAULT 24,
    is_active INTEGER DEFAULT 1,
    created_at TEXT DEFAULT (datetime('now')),
    last_run TEXT
  );

  CREATE TABLE IF NOT EXISTS job_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    search_config_id INTEGER REFERENCES search_configs(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    snippet TEXT,
    job_site TEXT,
    keyword TEXT,
    company TEXT,
    is_test INTEGER DEFAULT 0,
    found_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_job_results_user ON job_results(user_id);
`;

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, column: string, id: number): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new PersistenceError(`Column ${column} of row ${id} is not valid JSON`);
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new PersistenceError(`Column ${column} of row ${id} has an unexpected shape`);
  }
  return result.data;
}

function rowToConfig(row: ConfigRow): SearchConfig {
  const logic = searchLogicSchema.safeParse(row.search_logic ?? 'AND');
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    keywords: parseJson(stringListSchema, row.keywords, 'keywords', row.id),
    searchLogic: logic.success ? logic.data : 'AND',
    customLogic: row.custom_logic ?? '',
    jobSites: row.job_sites ? parseJson(stringListSchema, row.job_sites, 'job_sites', row.id) : [],
    locationFilter: row.location_filter ?? DEFAULT_LOCATION_FILTER,
    maxJobAge: row.max_job_age ?? DEFAULT_MAX_JOB_AGE,
    cadence: parseJson(cadenceSchema, row.cadence, 'cadence', row.id),
    isActive: row.is_active === 1,
    lastRun: row.last_run ? new Date(row.last_run) : null,
  };
}

function rowToUser(row: UserRow): UserCredentialView {
  const search = row.search_credentials
    ? parseJson(searchCredentialsSchema, row.search_credentials, 'search_credentials', row.id)
    : null;
  return {
    id: row.id,
    email: row.email,
    notificationEmail: row.notification_email || null,
    searchApiKey: search?.apiKey || null,
    searchEngineId: search?.engineId || null,
    mailAuthorized: Boolean(row.mail_credentials),
  };
}

function rowToPosting(row: PostingRow): StoredPosting {
  return {
    id: row.id,
    configId: row.search_config_id,
    isTest: row.is_test === 1,
    title: row.title,
    link: row.link,
    snippet: row.snippet ?? '',
    site: row.job_site ?? 'Unknown',
    keyword: row.keyword ?? '',
    company: row.company,
    foundAt: new Date(row.found_at),
  };
}

/** SQLite-backed storage. Pass `':memory:'` for a throwaway database. */
export class SqliteStorage implements Storage {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    log.info(`Database initialized (${filename})`);
  }

  close(): void {
    this.db.close();
  }

  async loadActiveConfigs(): Promise<SearchConfig[]> {
    const rows = this.db.prepare<[], ConfigRow>('SELECT * FROM search_configs WHERE is_active = 1 ORDER BY id').all();
    const configs: SearchConfig[] = [];
    for (const row of rows) {
      try {
        configs.push(rowToConfig(row));
      } catch (err) {
        log.error(`Skipping unreadable search config ${row.id}`, err);
      }
    }
    return configs;
  }

  async loadConfig(configId: number): Promise<SearchConfig | null> {
    const row = this.db.prepare<[number], ConfigRow>('SELECT * FROM search_configs WHERE id = ?').get(configId);
    return row ? rowToConfig(row) : null;
  }

  async loadUser(userId: number): Promise<UserCredentialView | null> {
    const row = this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(userId);
    return row ? rowToUser(row) : null;
  }

  async appendPostings(userId: number, configId: number, postings: JobPosting[]): Promise<number> {
    return this.write(() => this.db.transaction(() => this.insertPostings(userId, configId, postings, false))());
  }

  async updateLastRun(configId: number, timestamp: Date): Promise<void> {
    this.write(() => this.setLastRun(configId, timestamp));
  }

  async recordRun(userId: number, configId: number, postings: JobPosting[], completedAt: Date): Promise<number> {
    const tx = this.db.transaction(() => {
      const inserted = this.insertPostings(userId, configId, postings, false);
      this.setLastRun(configId, completedAt);
      return inserted;
    });
    return this.write(() => tx());
  }

  async replaceTestPostings(userId: number, postings: JobPosting[]): Promise<number> {
    const tx = this.db.transaction(() => {
      this.db.prepare('DELETE FROM job_results WHERE user_id = ? AND is_test = 1').run(userId);
      return this.insertPostings(userId, null, postings, true);
    });
    return this.write(() => tx());
  }

  createUser(user: NewUser): UserCredentialView {
    const result = this.db
      .prepare(
        `INSERT INTO users (email, name, notification_email, search_credentials, mail_credentials)
         VALUES (@email, @name, @notification_email, @search_credentials, @mail_credentials)`,
      )
      .run({
        email: user.email,
        name: user.name ?? null,
        notification_email: user.notificationEmail ?? null,
        search_credentials: user.searchCredentials ? JSON.stringify(user.searchCredentials) : null,
        mail_credentials: user.mailCredentials ?? null,
      });
    return rowToUser(this.requireRow<UserRow>('users', Number(result.lastInsertRowid)));
  }

  createConfig(config: NewSearchConfig): SearchConfig {
    const result = this.db
      .prepare(
        `INSERT INTO search_configs
           (user_id, name, keywords, search_logic, custom_logic, cadence, location_filter, job_sites, max_job_age, is_active)
         VALUES
           (@user_id, @name, @keywords, @search_logic, @custom_logic, @cadence, @location_filter, @job_sites, @max_job_age, @is_active)`,
      )
      .run(this.configParams(config));
    return rowToConfig(this.requireRow<ConfigRow>('search_configs', Number(result.lastInsertRowid)));
  }

  updateConfig(config: SearchConfig): SearchConfig {
    const result = this.db
      .prepare(
        `UPDATE search_configs SET
           name = @name, keywords = @keywords, search_logic = @search_logic, custom_logic = @custom_logic,
           cadence = @cadence, location_filter = @location_filter, job_sites = @job_sites,
           max_job_age = @max_job_age, is_active = @is_active
         WHERE id = @id AND user_id = @user_id`,
      )
      .run({ ...this.configParams(config), id: config.id });
    if (result.changes === 0) {
      throw new PersistenceError(`Search config ${config.id} not found for user ${config.userId}`);
    }
    return rowToConfig(this.requireRow<ConfigRow>('search_configs', config.id));
  }

  deleteConfig(configId: number): boolean {
    return this.db.prepare('DELETE FROM search_configs WHERE id = ?').run(configId).changes > 0;
  }

  listPostings(userId: number): StoredPosting[] {
    return this.db
      .prepare<[number], PostingRow>('SELECT * FROM job_results WHERE user_id = ? ORDER BY found_at DESC, id')
      .all(userId)
      .map(rowToPosting);
  }

  private configParams(config: NewSearchConfig) {
    return {
      user_id: config.userId,
      name: config.name,
      keywords: JSON.stringify(config.keywords),
      search_logic: config.searchLogic,
      custom_logic: config.customLogic,
      cadence: JSON.stringify(config.cadence),
      location_filter: config.locationFilter,
      job_sites: JSON.stringify(config.jobSites),
      max_job_age: config.maxJobAge,
      is_active: config.isActive ? 1 : 0,
    };
  }

  private insertPostings(userId: number, configId: number | null, postings: JobPosting[], isTest: boolean): number {
    const stmt = this.db.prepare(`
      INSERT INTO job_results (user_id, search_config_id, title, link, snippet, job_site, keyword, company, is_test, found_at)
      VALUES (@user_id, @search_config_id, @title, @link, @snippet, @job_site, @keyword, @company, @is_test, @found_at)
    `);
    for (const posting of postings) {
      stmt.run({
        user_id: userId,
        search_config_id: configId,
        title: posting.title,
        link: posting.link,
        snippet: posting.snippet,
        job_site: posting.site,
        keyword: posting.keyword,
        company: posting.company,
        is_test: isTest ? 1 : 0,
        found_at: posting.foundAt.toISOString(),
      });
    }
    return postings.length;
  }

  private setLastRun(configId: number, timestamp: Date): void {
    const result = this.db
      .prepare('UPDATE search_configs SET last_run = ? WHERE id = ?')
      .run(timestamp.toISOString(), configId);
    if (result.changes === 0) {
      throw new PersistenceError(`Search config ${configId} no longer exists`);
    }
  }

  private requireRow<T>(table: 'users' | 'search_configs', id: number): T {
    const row = this.db.prepare<[number], T>(`SELECT * FROM ${table} WHERE id = ?`).get(id);
    if (!row) {
      throw new PersistenceError(`Row ${id} missing from ${table}`);
    }
    return row;
  }

  private write<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Database write failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }
}
