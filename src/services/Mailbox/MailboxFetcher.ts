// src/services/Mailbox/MailboxFetcher.ts

import { ImapFlow } from 'imapflow';
import type { MailboxSettings } from '../../config/environment';
import type { MailboxCredentials, RawMessage } from '../../Types/model';
import { addDays, formatImapDate, parseCalendarDate } from '../../utils/dateUtils';
import {
  AuthenticationFailedError,
  ConfigurationInvalidError,
  ConnectionFailedError,
  EmailAssistantError,
  errorMessage,
} from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { err, ok, partitionResults, type Result } from '../../utils/result';
import DebugLogger from '../../utils/DebugLogger';

/**
 * The slice of an IMAP session the fetcher relies on. ImapFlow satisfies it.
 */
export interface MailboxClient {
  connect(): Promise<void>;
  mailboxOpen(path: string): Promise<unknown>;
  search(query: { since: Date; before: Date }): Promise<number[] | false>;
  fetchOne(seq: string, query: { source: true }): Promise<{ source?: Buffer } | false>;
  mailboxClose(): Promise<unknown>;
  logout(): Promise<void>;
}

export type TransportSettings = Omit<MailboxSettings, 'user' | 'password'>;

export type MailboxClientFactory = (settings: TransportSettings, credentials: MailboxCredentials) => MailboxClient;

interface ErrorEmitter {
  on(event: 'error', listener: (error: unknown) => void): unknown;
}

const clientLogger = createLogger('ImapClient');

/**
 * Socket errors after connect are emitted, not thrown; without a listener they crash the process.
 * The pending command still rejects and is reported by the fetcher.
 */
export function logClientErrors<T extends ErrorEmitter>(client: T): T {
  client.on('error', error => {
    clientLogger.error('IMAP connection error:', errorMessage(error));
  });
  return client;
}

export const createImapClient: MailboxClientFactory = (settings, credentials) => {
  const client: MailboxClient = logClientErrors(new ImapFlow({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: {
      user: credentials.user,
      pass: credentials.password,
    },
    logger: false,
  }));
  return client;
};

export interface SearchRange {
  since: Date;
  before: Date;
  // `SINCE "DD-Mon-YYYY" BEFORE "DD-Mon-YYYY"`
  expression: string;
}

/**
 * Inclusive YYYY-MM-DD range as an IMAP search. BEFORE is exclusive, hence end + 1 day.
 */
export function buildSearchRange(startDate: string, endDate: string): SearchRange {
  const since = parseCalendarDate(startDate);
  const end = parseCalendarDate(endDate);

  const problems: string[] = [];
  if (!since) problems.push(`Start date must be a valid YYYY-MM-DD date, got '${startDate}'`);
  if (!end) problems.push(`End date must be a valid YYYY-MM-DD date, got '${endDate}'`);
  if (!since || !end) {
    throw new ConfigurationInvalidError(problems);
  }

  const before = addDays(end, 1);
  return {
    since,
    before,
    expression: `SINCE "${formatImapDate(since)}" BEFORE "${formatImapDate(before)}"`,
  };
}

function isAuthenticationFailure(error: unknown): boolean {
  return typeof error === 'object' && error !== null &&
    'authenticationFailed' in error && error.authenticationFailed === true;
}

export interface FetchFailure {
  seq: number;
  reason: string;
}

export class MailboxFetcher {
  private logger = createLogger('MailboxFetcher');

  constructor(
    private settings: TransportSettings,
    private clientFactory: MailboxClientFactory = createImapClient
  ) {}

  /**
   * Fetches every message dated within [startDate, endDate], both ends included.
   * Messages that fail to download are skipped; the session is always closed.
   */
  async fetch(credentials: MailboxCredentials, startDate: string, endDate: string): Promise<RawMessage[]> {
    const range = buildSearchRange(startDate, endDate);
    const client = this.clientFactory(this.settings, credentials);

    try {
      await client.connect();
      await client.mailboxOpen(this.settings.mailbox);

      this.logger.info(`Searching ${this.settings.mailbox}: (${range.expression})`);
      const matches = await client.search({ since: range.since, before: range.before });

      if (matches === false) {
        this.logger.warn('Search did not complete successfully, returning no messages');
        return [];
      }

      const results: Result<RawMessage, FetchFailure>[] = [];
      for (const seq of matches) {
        results.push(await this.fetchMessage(client, seq));
      }

      const { values, errors } = partitionResults(results);
      for (const failure of errors) {
        this.logger.warn(`Skipping message ${failure.seq}: ${failure.reason}`);
      }
      this.logger.info(`Fetched ${values.length} of ${matches.length} messages`);
      return values;
    } catch (error) {
      if (error instanceof EmailAssistantError) throw error;
      if (isAuthenticationFailure(error)) {
        throw new AuthenticationFailedError(`IMAP authentication failed: ${errorMessage(error)}`, error);
      }
      throw new ConnectionFailedError(`Failed to fetch emails: ${errorMessage(error)}`, error);
    } finally {
      await this.closeSession(client);
    }
  }

  private async fetchMessage(client: MailboxClient, seq: number): Promise<Result<RawMessage, FetchFailure>> {
    try {
      const message = await client.fetchOne(String(seq), { source: true });
      if (message === false || !message.source) {
        return err({ seq, reason: 'server returned no message source' });
      }
      DebugLogger.log('[MailboxFetcher] Fetched message', { seq, size: message.source.length });
      return ok({ id: String(seq), source: message.source });
    } catch (error) {
      return err({ seq, reason: errorMessage(error) });
    }
  }

  /**
   * Close and logout; cleanup failures are logged and never replace the fetch outcome.
   */
  private async closeSession(client: MailboxClient) {
    try {
      await client.mailboxClose();
    } catch (error) {
      this.logger.warn('Ignoring error while closing mailbox:', errorMessage(error));
    }
    try {
      await client.logout();
    } catch (error) {
      this.logger.warn('Ignoring error during logout:', errorMessage(error));
    }
  }
}
