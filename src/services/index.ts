// src/services/index.ts
import type { AppConfig } from '../config/environment';
import type { AIProvider } from '../Types/model';
import { EmailRecordBuilder } from './Email/EmailRecordBuilder';
import { MessageDecoder } from './Email/MessageDecoder';
import { TextSanitizer } from './Email/TextSanitizer';
import { VectorIndexer } from './Index/VectorIndexer';
import { IngestionService } from './Ingestion/IngestionService';
import { LLMProviderFactory } from './LLM/LLMProviderFactory';
import { MailboxFetcher, type MailboxClientFactory } from './Mailbox/MailboxFetcher';
import { ConversationalQueryEngine } from './Query/ConversationalQueryEngine';
import { RetrievalEngine } from './Query/RetrievalEngine';

export interface Services {
  config: AppConfig;
  provider: AIProvider;
  fetcher: MailboxFetcher;
  decoder: MessageDecoder;
  sanitizer: TextSanitizer;
  recordBuilder: EmailRecordBuilder;
  indexer: VectorIndexer;
  retrieval: RetrievalEngine;
  queryEngine: ConversationalQueryEngine;
  ingestion: IngestionService;
}

export interface ServiceOverrides {
  provider?: AIProvider;
  mailboxClientFactory?: MailboxClientFactory;
}

/**
 * Wires every component from one configuration value.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const provider = overrides.provider ?? LLMProviderFactory.createProvider(config);

  const { host, port, secure, mailbox } = config.mailbox;
  const fetcher = new MailboxFetcher({ host, port, secure, mailbox }, overrides.mailboxClientFactory);
  const decoder = new MessageDecoder();
  const sanitizer = new TextSanitizer();
  const recordBuilder = new EmailRecordBuilder(sanitizer);
  const indexer = new VectorIndexer(provider, recordBuilder, {
    collection: config.vectorStore.collection,
    persistDirectory: config.vectorStore.directory,
  });
  const retrieval = new RetrievalEngine(provider, config.defaultRetrievalCount);
  const queryEngine = new ConversationalQueryEngine(provider, retrieval, config.llmTemperature);
  const ingestion = new IngestionService(fetcher, decoder, recordBuilder, indexer);

  return { config, provider, fetcher, decoder, sanitizer, recordBuilder, indexer, retrieval, queryEngine, ingestion };
}
