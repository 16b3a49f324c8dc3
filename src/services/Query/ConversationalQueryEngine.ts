// src/services/Query/ConversationalQueryEngine.ts

import type { LLMMessage, LLMProvider } from '../../Types/model';
import { IndexNotFoundError, QueryFailedError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { VectorIndexHandle } from '../Index/VectorIndexer';
import type { RetrievalEngine } from './RetrievalEngine';
import type { SessionHistory } from './SessionHistory';

const SYSTEM_PROMPT = `You are an intelligent email assistant. Answer the user's question based on the provided email context.
Be concise, accurate, and helpful. If the context doesn't contain enough information to answer the question, say so.
When counting or listing emails, be specific and accurate based on the provided context.`;

const FOLLOW_UP_INSTRUCTION = 'You can refer to previous conversation context when answering follow-up questions.';

export function buildQuestionTurn(context: string, question: string): string {
  return `Context (Retrieved Emails):
${context}

Question: ${question}

Answer:`;
}

export interface AskOptions {
  k?: number;
  history?: SessionHistory;
}

export interface AskResult {
  answer: string;
  retrieved: number;
}

export class ConversationalQueryEngine {
  private logger = createLogger('ConversationalQueryEngine');

  constructor(
    private llm: LLMProvider,
    private retrieval: RetrievalEngine,
    private temperature: number
  ) {}

  /**
   * System instruction, then prior turns in order, then the context-and-question turn.
   */
  buildMessages(context: string, question: string, history?: SessionHistory): LLMMessage[] {
    const messages: LLMMessage[] = [];

    if (history) {
      messages.push({ role: 'system', content: `${SYSTEM_PROMPT}\n${FOLLOW_UP_INSTRUCTION}` });
      for (const turn of history.messages) {
        messages.push({ role: turn.role, content: turn.content });
      }
    } else {
      messages.push({ role: 'system', content: SYSTEM_PROMPT });
    }

    messages.push({ role: 'user', content: buildQuestionTurn(context, question) });
    return messages;
  }

  /**
   * Answers one question. History, when given, grows by the user turn and then the
   * assistant turn, and only if the completion succeeded.
   */
  async answer(context: string, question: string, history?: SessionHistory): Promise<string> {
    const messages = this.buildMessages(context, question, history);

    let answer: string;
    try {
      const response = await this.llm.generateResponse(messages, { temperature: this.temperature });
      answer = response.content;
    } catch (error) {
      this.logger.error('Completion failed:', error);
      throw new QueryFailedError(`Failed to query emails: ${errorMessage(error)}`, error);
    }

    if (history) {
      history.addUserMessage(question);
      history.addAssistantMessage(answer);
    }
    return answer;
  }

  /**
   * Retrieval followed by a conversational answer.
   */
  async ask(handle: VectorIndexHandle, question: string, options: AskOptions = {}): Promise<AskResult> {
    let context: string;
    let retrieved: number;
    try {
      const result = await this.retrieval.retrieve(handle, question, options.k);
      context = result.text;
      retrieved = result.entries.length;
    } catch (error) {
      if (error instanceof IndexNotFoundError || error instanceof QueryFailedError) throw error;
      throw new QueryFailedError(`Failed to query emails: ${errorMessage(error)}`, error);
    }

    const answer = await this.answer(context, question, options.history);
    return { answer, retrieved };
  }
}
