import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConversationalQueryEngine, buildQuestionTurn } from './ConversationalQueryEngine';
import { RetrievalEngine } from './RetrievalEngine';
import { SessionHistory } from './SessionHistory';
import { VectorIndexer } from '../Index/VectorIndexer';
import { EmailRecordBuilder } from '../Email/EmailRecordBuilder';
import { TextSanitizer } from '../Email/TextSanitizer';
import { LocalVectorStore } from '../../repositories/VectorStoreRepository';
import { FakeAIProvider } from '../../testing/fakes';
import { IndexNotFoundError, QueryFailedError } from '../../utils/errors';

describe('buildQuestionTurn', () => {
  it('places the context before the question', () => {
    expect(buildQuestionTurn('CTX', 'Who wrote?')).toBe('Context (Retrieved Emails):\nCTX\n\nQuestion: Who wrote?\n\nAnswer:');
  });
});

describe('ConversationalQueryEngine', () => {
  let provider: FakeAIProvider;
  let retrieval: RetrievalEngine;
  let engine: ConversationalQueryEngine;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    provider = new FakeAIProvider();
    retrieval = new RetrievalEngine(provider, 50);
    engine = new ConversationalQueryEngine(provider, retrieval, 0.2);
  });

  describe('buildMessages', () => {
    it('sends the system instruction and one user turn without history', () => {
      const messages = engine.buildMessages('CTX', 'Q');

      expect(messages.map(message => message.role)).toEqual(['system', 'user']);
      expect(messages[0].content.startsWith('You are an intelligent email assistant.')).toBe(true);
      expect(messages[0].content).not.toContain('follow-up');
      expect(messages[1].content).toBe(buildQuestionTurn('CTX', 'Q'));
    });

    it('replays prior turns between the instruction and the new question', () => {
      const history = new SessionHistory([
        { role: 'user', content: 'Q1' },
        { role: 'assistant', content: 'A1' },
      ]);
      const messages = engine.buildMessages('CTX', 'Q2', history);

      expect(messages.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
      expect(messages[0].content.endsWith(
        'You can refer to previous conversation context when answering follow-up questions.'
      )).toBe(true);
      expect(messages[1].content).toBe('Q1');
      expect(messages[2].content).toBe('A1');
    });
  });

  describe('answer', () => {
    it('appends the question and the answer to the history', async () => {
      const history = new SessionHistory([
        { role: 'user', content: 'Q1' },
        { role: 'assistant', content: 'A1' },
      ]);
      provider.queueAnswer('A2');

      await expect(engine.answer('CTX', 'Q2', history)).resolves.toBe('A2');
      expect(history.messages).toEqual([
        { role: 'user', content: 'Q1' },
        { role: 'assistant', content: 'A1' },
        { role: 'user', content: 'Q2' },
        { role: 'assistant', content: 'A2' },
      ]);
    });

    it('stores the bare question, not the context turn', async () => {
      const history = new SessionHistory();
      provider.queueAnswer('Yes');

      await engine.answer('long context', 'Any invoices?', history);

      expect(history.messages[0]).toEqual({ role: 'user', content: 'Any invoices?' });
    });

    it('passes the configured temperature', async () => {
      const spy = vi.spyOn(provider, 'generateResponse');

      await engine.answer('CTX', 'Q');

      expect(spy).toHaveBeenCalledWith(expect.any(Array), { temperature: 0.2 });
    });

    it('leaves the history untouched when the completion fails', async () => {
      const history = new SessionHistory([{ role: 'user', content: 'Q1' }, { role: 'assistant', content: 'A1' }]);
      provider.queueAnswer(new Error('model offline'));

      await expect(engine.answer('CTX', 'Q2', history)).rejects.toThrow(
        new QueryFailedError('Failed to query emails: model offline')
      );
      expect(history.length).toBe(2);
    });
  });

  describe('ask', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'query-'));
    });

    afterEach(async () => {
      await fs.promises.rm(directory, { recursive: true, force: true });
    });

    it('answers from the retrieved emails', async () => {
      const indexer = new VectorIndexer(provider, new EmailRecordBuilder(new TextSanitizer()), {
        collection: 'emails',
        persistDirectory: directory,
      });
      const { handle } = await indexer.index([
        { sender: 'alice@example.com', subject: 'Invoice', date: 'Mon, 6 Jan 2025', body: 'Invoice attached' },
        { sender: 'bob@example.com', subject: 'Lunch', date: 'Tue, 7 Jan 2025', body: 'Lunch later' },
      ]);
      provider.queueAnswer('One invoice from Alice.');

      const result = await engine.ask(handle, 'How many invoices?', { k: 1 });

      expect(result).toEqual({ answer: 'One invoice from Alice.', retrieved: 1 });
      const userTurn = provider.completionCalls[0][1].content;
      expect(userTurn).toContain('--- Email 1 ---\nSender: alice@example.com');
      expect(userTurn).not.toContain('bob@example.com');
    });

    it('fails without calling the model when the index is missing', async () => {
      const handle = { store: new LocalVectorStore(directory), collection: 'emails' };

      await expect(engine.ask(handle, 'Anything?')).rejects.toThrow(IndexNotFoundError);
      expect(provider.completionCalls).toEqual([]);
    });

    it('wraps unexpected retrieval errors', async () => {
      const handle = { store: new LocalVectorStore(directory), collection: 'emails' };
      vi.spyOn(retrieval, 'retrieve').mockRejectedValueOnce(new Error('disk unavailable'));

      await expect(engine.ask(handle, 'Anything?')).rejects.toThrow(
        new QueryFailedError('Failed to query emails: disk unavailable')
      );
    });
  });
});
