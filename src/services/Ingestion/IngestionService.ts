// src/services/Ingestion/IngestionService.ts

import type { DateRange, MailboxCredentials } from '../../Types/model';
import { createLogger } from '../../utils/logger';
import type { IEmailRecordBuilder, IMessageDecoder } from '../Email/interfaces';
import type { IndexLocation, VectorIndexer } from '../Index/VectorIndexer';
import type { MailboxFetcher } from '../Mailbox/MailboxFetcher';

export interface IngestionResult {
  fetched: number;
  decoded: number;
  skipped: number;
  indexed: number;
  collection: string;
  ids: string[];
}

/**
 * Build-time flow: fetch -> decode -> build records -> index.
 */
export class IngestionService {
  private logger = createLogger('IngestionService');

  constructor(
    private fetcher: MailboxFetcher,
    private decoder: IMessageDecoder,
    private recordBuilder: IEmailRecordBuilder,
    private indexer: VectorIndexer
  ) {}

  async ingest(credentials: MailboxCredentials, range: DateRange, location?: IndexLocation): Promise<IngestionResult> {
    this.logger.info(`Ingesting emails from ${range.startDate} to ${range.endDate}`);

    const raws = await this.fetcher.fetch(credentials, range.startDate, range.endDate);
    const { messages, failures } = await this.decoder.decodeAll(raws);
    const records = messages.map(message => this.recordBuilder.build(message));

    const { handle, ids } = await this.indexer.index(records, location);

    const result: IngestionResult = {
      fetched: raws.length,
      decoded: messages.length,
      skipped: failures.length,
      indexed: ids.length,
      collection: handle.collection,
      ids,
    };
    this.logger.info('Ingestion complete', {
      fetched: result.fetched,
      decoded: result.decoded,
      skipped: result.skipped,
      indexed: result.indexed
    });
    return result;
  }
}
