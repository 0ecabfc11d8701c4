import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { ConversationTurn } from '../types';
import { CONDENSE_PROMPT } from '../prompts/system-prompt';
import { toHistoryMessages, type TracingHandlerFactory } from './answer-generator';
import { sanitizeForLog } from '../utils/sanitize';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export interface CondenseInput {
  question: string;
  history: ConversationTurn[];
  sessionId?: string;
}

/**
 * Capability: rewrite a follow-up question into one that can be searched
 * without the conversation.
 */
export interface QuestionCondenser {
  condense(input: CondenseInput, signal?: AbortSignal): Promise<string>;
}

const condensePrompt = ChatPromptTemplate.fromMessages([
  ['system', CONDENSE_PROMPT],
  new MessagesPlaceholder('history'),
  ['human', 'Follow-up question: {question}'],
]);

/**
 * Condenses through a chat model. Without history the question is returned
 * as is; when the model fails the original question is searched instead.
 */
export class ChatModelCondenser implements QuestionCondenser {
  constructor(
    private readonly model: BaseChatModel,
    private readonly tracing?: TracingHandlerFactory
  ) {}

  async condense(input: CondenseInput, signal?: AbortSignal): Promise<string> {
    if (input.history.length === 0) {
      return input.question;
    }

    const stepId = debugLogger.stepStart('CONDENSE', 'Rewriting follow-up question', {
      historyTurns: input.history.length,
    });
    const handler = this.tracing?.(input.sessionId) ?? null;

    try {
      const response = await condensePrompt.pipe(this.model).invoke(
        { history: toHistoryMessages(input.history), question: input.question },
        { signal, callbacks: handler ? [handler] : undefined }
      );
      const content = typeof response.content === 'string' ? response.content : '';
      const standalone = content.replace(/\s+/g, ' ').trim() || input.question;

      debugLogger.stepFinish(stepId, { standalone: sanitizeForLog(standalone.substring(0, 100)) });
      return standalone;
    } catch (error) {
      if (signal?.aborted) throw error;
      debugLogger.stepError(stepId, 'CONDENSE', 'Rewrite failed', error);
      console.warn(`Question rewrite failed, searching with the original question: ${errorMessage(error)}`);
      return input.question;
    }
  }
}
