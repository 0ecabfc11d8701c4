import type { QueryFilter, QueryRequest, RetrievalStrategy, RetrievedChunk, StreamEvent } from '../types';
import type { AnswerGenerator } from '../agents/answer-generator';
import type { QuestionCondenser } from '../agents/question-condenser';
import type { SearchOptions } from '../search/vector-index';
import type { SessionMemoryStore } from '../memory/session-store';
import { buildCitations, formatCitations } from './citations';
import { INSUFFICIENT_CONTEXT_ANSWER } from '../prompts/system-prompt';
import { validateUserQuestion, sanitizeForLog } from '../utils/sanitize';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export interface Retriever {
  similaritySearch(query: string, options?: SearchOptions): Promise<RetrievedChunk[]>;
}

export interface EngineOptions {
  topK?: number;
  retrievalType?: RetrievalStrategy;
  /** Rewrites follow-ups into standalone search queries when the session has history */
  condenser?: QuestionCondenser;
}

export interface StreamQueryOptions {
  signal?: AbortSignal;
}

export function buildFilter(sources: string[] | undefined): QueryFilter | undefined {
  const names = (sources ?? []).map(s => s.trim()).filter(s => s.length > 0);
  return names.length > 0 ? { sourceNames: names } : undefined;
}

/**
 * Retrieval-augmented question answering over the news index, with one
 * serialized conversation per session id.
 *
 * A turn is committed to session memory only when the answer stream ran to
 * completion. Errors and cancellation leave the history untouched.
 */
export class ConversationalRetrievalEngine {
  private readonly topK: number;
  private readonly retrievalType: RetrievalStrategy;
  private readonly condenser: QuestionCondenser | null;

  constructor(
    private readonly retriever: Retriever,
    private readonly generator: AnswerGenerator,
    private readonly sessions: SessionMemoryStore,
    options: EngineOptions = {}
  ) {
    this.topK = options.topK ?? 5;
    this.retrievalType = options.retrievalType ?? 'similarity';
    this.condenser = options.condenser ?? null;
  }

  async *streamQuery(request: QueryRequest, options: StreamQueryOptions = {}): AsyncGenerator<StreamEvent> {
    const { signal } = options;
    const { sessionId } = request;

    const validation = validateUserQuestion(request.query);
    if (!validation.valid) {
      yield { type: 'error', message: validation.error ?? 'Invalid query', partialAnswer: '' };
      return;
    }
    if (validation.error) {
      debugLogger.warn('QUERY', 'Suspicious input patterns detected and sanitized', {
        sessionId,
        preview: sanitizeForLog(request.query.substring(0, 100)),
      });
    }
    const question = validation.sanitized;

    const queryStepId = debugLogger.stepStart('QUERY', 'Handling query', {
      sessionId,
      questionPreview: sanitizeForLog(question.substring(0, 50)),
      sources: request.sources,
    });

    const release = await this.sessions.acquire(sessionId);
    const generation = new AbortController();
    const onAbort = () => generation.abort();
    signal?.addEventListener('abort', onAbort);

    let completed = false;
    try {
      if (signal?.aborted) return;

      const history = this.sessions.getOrCreate(sessionId).turns;
      const filter = buildFilter(request.sources);

      let chunks: RetrievedChunk[];
      try {
        const searchQuery =
          this.condenser && history.length > 0
            ? await this.condenser.condense({ question, history, sessionId }, generation.signal)
            : question;
        if (signal?.aborted) return;

        chunks = await this.retriever.similaritySearch(searchQuery, {
          k: this.topK,
          filter,
          strategy: this.retrievalType,
        });
      } catch (error) {
        if (signal?.aborted) return;
        debugLogger.stepError(queryStepId, 'RETRIEVAL', 'Retrieval failed', error);
        yield { type: 'error', message: errorMessage(error), partialAnswer: '' };
        return;
      }

      if (signal?.aborted) return;

      let answer = '';

      if (chunks.length === 0) {
        answer = INSUFFICIENT_CONTEXT_ANSWER;
        yield { type: 'answer', text: answer };
      } else {
        try {
          const stream = this.generator.stream(
            { question, context: chunks.map(c => c.content), history, sessionId },
            generation.signal
          );
          for await (const text of stream) {
            if (signal?.aborted) return;
            answer += text;
            yield { type: 'answer', text };
          }
        } catch (error) {
          if (signal?.aborted) return;
          debugLogger.stepError(queryStepId, 'GENERATION', 'Generation failed', error);
          yield { type: 'error', message: errorMessage(error), partialAnswer: answer };
          return;
        }

        if (signal?.aborted) return;

        const citations = buildCitations(chunks);
        yield { type: 'citations', citations, text: formatCitations(citations) };
      }

      this.sessions.appendTurn(sessionId, question, answer);
      completed = true;
      debugLogger.stepFinish(queryStepId, { chunks: chunks.length, answerLength: answer.length });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!completed) {
        generation.abort();
        debugLogger.info('STREAM', 'Query ended without committing a turn', { sessionId });
      }
      release();
    }
  }
}
