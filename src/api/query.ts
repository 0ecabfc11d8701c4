import type { StreamEvent } from '../types';
import type { ConversationalRetrievalEngine } from '../engine/conversational-engine';
import { QueryBodySchema } from '../schemas';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

/**
 * Wire form of a stream event. The concatenation of all pieces is the
 * answer, the sources block and, on failure, a visible error line.
 */
export function renderEvent(event: StreamEvent): string {
  switch (event.type) {
    case 'answer':
      return event.text;
    case 'citations':
      return event.text;
    case 'error':
      return `\n\n**Error:** ${event.message}`;
  }
}

/**
 * The parts of an Express request and response the query stream uses
 */
export interface QueryRequest {
  body: unknown;
}

export interface QueryResponse {
  readonly writableEnded: boolean;
  status(code: number): unknown;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  on(event: 'close', listener: () => void): unknown;
  end(): unknown;
}

export function createQueryHandler(engine: ConversationalRetrievalEngine) {
  return async function handleQuery(req: QueryRequest, res: QueryResponse): Promise<void> {
    const parsed = QueryBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400);
      res.json({
        error: 'Invalid request',
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
      return;
    }

    const { query, session_id: sessionId, sources } = parsed.data;

    res.status(200);
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    // Client disconnect aborts retrieval and generation
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        debugLogger.info('STREAM', 'Client disconnected, aborting query', { sessionId });
        controller.abort();
      }
    });

    try {
      for await (const event of engine.streamQuery({ query, sessionId, sources }, { signal: controller.signal })) {
        if (controller.signal.aborted) break;
        res.write(renderEvent(event));
      }
    } catch (error) {
      console.error('Error streaming query:', error);
      if (!controller.signal.aborted) {
        res.write(renderEvent({ type: 'error', message: errorMessage(error), partialAnswer: '' }));
      }
    } finally {
      if (!res.writableEnded) {
        res.end();
      }
    }
  };
}
