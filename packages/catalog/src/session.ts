/**
 * Catalog Session
 *
 * Owns the process-wide catalog client. Calls read the current client on
 * every attempt, so when one of them reports a lost session the rebuilt
 * client is picked up by the retry and by every later call. A rebuild tries
 * the account credentials first and falls back to an anonymous client.
 */

import {
  SessionCell,
  createPolicy,
  resilientCall,
  type CallPolicy,
  type PolicyDefaults,
} from '@tunegrab/core';
import { createLogger, type Logger } from '@tunegrab/utils';
import { loadBrowserAuth } from './auth.js';
import { CatalogClient, type CatalogClientConfig } from './client.js';
import { classifyCatalogError } from './errors.js';

export type CatalogAuthState = 'authenticated' | 'anonymous';

export interface CatalogSessionOptions {
  /** Saved browser request headers; absent means anonymous only */
  headersFile?: string;
  client?: Omit<CatalogClientConfig, 'auth'>;
  retry: PolicyDefaults;
  logger?: Logger;
}

interface SessionEntry {
  client: CatalogClient;
  state: CatalogAuthState;
}

async function establish(options: CatalogSessionOptions, log: Logger): Promise<SessionEntry> {
  if (options.headersFile) {
    try {
      const auth = await loadBrowserAuth(options.headersFile);
      const client = new CatalogClient({ ...options.client, auth });
      await client.verifyAuthentication();
      log.info('Catalog session authenticated');
      return { client, state: 'authenticated' };
    } catch (error) {
      log.warn({ err: error }, 'Catalog authentication failed, continuing anonymously');
    }
  }
  return { client: new CatalogClient({ ...options.client, auth: null }), state: 'anonymous' };
}

export class CatalogSession {
  private readonly cell: SessionCell<SessionEntry>;
  private readonly log: Logger;

  private constructor(
    initial: SessionEntry,
    private readonly options: CatalogSessionOptions,
    log: Logger,
  ) {
    this.cell = new SessionCell(initial);
    this.log = log;
  }

  static async open(options: CatalogSessionOptions): Promise<CatalogSession> {
    const log = options.logger ?? createLogger({ component: 'catalog-session' });
    return new CatalogSession(await establish(options, log), options, log);
  }

  get state(): CatalogAuthState {
    return this.cell.current().state;
  }

  client(): CatalogClient {
    return this.cell.current().client;
  }

  /**
   * Rebuild the client. Concurrent callers share one rebuild.
   */
  async reauthenticate(): Promise<void> {
    const before = this.cell.generation;
    const snapshot = await this.cell.refresh(() => establish(this.options, this.log));
    this.log.info({ state: snapshot.value.state, generation: snapshot.generation, before }, 'Catalog session rebuilt');
  }

  policy(name: string, overrides: Partial<CallPolicy> = {}): CallPolicy {
    return createPolicy(name, classifyCatalogError, this.options.retry, {
      logger: this.log,
      reauthenticate: () => this.reauthenticate(),
      ...overrides,
    });
  }

  /**
   * Run `fn` against the current client under the catalog retry policy
   */
  call<T>(name: string, fn: (client: CatalogClient) => Promise<T>): Promise<T> {
    return resilientCall(() => fn(this.client()), this.policy(name));
  }
}
