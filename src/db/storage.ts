import type { JobPosting, SearchConfig, UserCredentialView } from '../types';

/** What the engine needs from persistence. */
export interface Storage {
  loadActiveConfigs(): Promise<SearchConfig[]>;
  loadConfig(configId: number): Promise<SearchConfig | null>;
  loadUser(userId: number): Promise<UserCredentialView | null>;
  appendPostings(userId: number, configId: number, postings: JobPosting[]): Promise<number>;
  updateLastRun(configId: number, timestamp: Date): Promise<void>;
  /** Appends the batch and advances `lastRun` in one transaction. */
  recordRun(userId: number, configId: number, postings: JobPosting[], completedAt: Date): Promise<number>;
  /** Drops the user's earlier test-run postings and stores the new ones. */
  replaceTestPostings(userId: number, postings: JobPosting[]): Promise<number>;
}

export interface CredentialCheck {
  hasMailCredential(userId: number): Promise<boolean>;
  hasSearchCredential(userId: number): Promise<boolean>;
}

export class StorageCredentialCheck implements CredentialCheck {
  constructor(private readonly storage: Pick<Storage, 'loadUser'>) {}

  async hasMailCredential(userId: number): Promise<boolean> {
    const user = await this.storage.loadUser(userId);
    return Boolean(user?.mailAuthorized);
  }

  async hasSearchCredential(userId: number): Promise<boolean> {
    const user = await this.storage.loadUser(userId);
    return Boolean(user?.searchApiKey && user.searchEngineId);
  }
}
