import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts';
import { AIMessage, HumanMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { CallbackHandler } from '@langfuse/langchain';
import type { ConversationTurn } from '../types';
import { SYSTEM_PROMPT } from '../prompts/system-prompt';
import { GenerationError, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export interface GenerationInput {
  question: string;
  /** Retrieved chunk texts, in rank order */
  context: string[];
  history: ConversationTurn[];
  sessionId?: string;
}

/**
 * Capability: stream(system, context, history, question) -> text increments.
 * Failures surface as GenerationError carrying the text produced so far.
 */
export interface AnswerGenerator {
  stream(input: GenerationInput, signal?: AbortSignal): AsyncIterable<string>;
}

export type TracingHandlerFactory = (sessionId?: string) => CallbackHandler | null;

const answerPrompt = ChatPromptTemplate.fromMessages([
  ['system', `${SYSTEM_PROMPT}\n\nCONTEXT:\n{context}`],
  new MessagesPlaceholder('history'),
  ['human', '{question}'],
]);

export function formatContext(context: string[]): string {
  if (context.length === 0) {
    return '(no articles found)';
  }
  return context.map((text, i) => `[${i + 1}] ${text}`).join('\n\n');
}

export function toHistoryMessages(turns: ConversationTurn[]): BaseMessage[] {
  return turns.flatMap(turn => [new HumanMessage(turn.question), new AIMessage(turn.answer)]);
}

/**
 * Streams answers from a LangChain chat model through the answer prompt
 */
export class ChatModelGenerator implements AnswerGenerator {
  constructor(
    private readonly model: BaseChatModel,
    private readonly tracing?: TracingHandlerFactory
  ) {}

  async *stream(input: GenerationInput, signal?: AbortSignal): AsyncGenerator<string> {
    const stepId = debugLogger.stepStart('GENERATION', 'Streaming answer', {
      contextChunks: input.context.length,
      historyTurns: input.history.length,
    });

    const handler = this.tracing?.(input.sessionId) ?? null;
    let partial = '';

    try {
      const chain = answerPrompt.pipe(this.model);
      const stream = await chain.stream(
        {
          context: formatContext(input.context),
          history: toHistoryMessages(input.history),
          question: input.question,
        },
        { signal, callbacks: handler ? [handler] : undefined }
      );

      for await (const chunk of stream) {
        const text = chunk.text;
        if (!text) continue;
        partial += text;
        yield text;
      }

      debugLogger.stepFinish(stepId, { length: partial.length });
    } catch (error) {
      if (signal?.aborted) {
        debugLogger.stepFinish(stepId, { aborted: true, length: partial.length });
        return;
      }
      debugLogger.stepError(stepId, 'GENERATION', 'Answer stream failed', error);
      throw error instanceof GenerationError
        ? error
        : new GenerationError(`Answer generation failed: ${errorMessage(error)}`, partial, { cause: error });
    }
  }
}
