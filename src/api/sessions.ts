/**
 * API endpoints for session memory
 */

import { Router } from 'express';
import type { SessionMemoryStore } from '../memory/session-store';
import { SessionIdSchema } from '../schemas';

export function createSessionsRouter(sessions: SessionMemoryStore): Router {
  const router = Router();

  /**
   * GET /api/v1/sessions
   */
  router.get('/', (_req, res) => {
    res.json({ sessions: sessions.list() });
  });

  /**
   * GET /api/v1/sessions/:sessionId
   */
  router.get('/:sessionId', (req, res) => {
    const parsed = SessionIdSchema.safeParse(req.params.sessionId);
    const session = parsed.success ? sessions.get(parsed.data) : undefined;

    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    res.json({
      sessionId: session.sessionId,
      createdAt: session.createdAt.toISOString(),
      lastAccessedAt: session.lastAccessedAt.toISOString(),
      turns: session.turns.map(t => ({
        question: t.question,
        answer: t.answer,
        createdAt: t.createdAt.toISOString(),
      })),
    });
  });

  /**
   * DELETE /api/v1/sessions/:sessionId
   */
  router.delete('/:sessionId', (req, res) => {
    const parsed = SessionIdSchema.safeParse(req.params.sessionId);
    if (!parsed.success || !sessions.delete(parsed.data)) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ success: true });
  });

  return router;
}
