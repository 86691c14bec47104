/**
 * Session Routes
 *
 * REST endpoints over the Orchestrator:
 *
 * - POST /api/sessions                    - Start a session on a catalog entry
 * - GET  /api/sessions/:id                - Current snapshot
 * - GET  /api/sessions/:id/timeline       - Every recorded event
 * - POST /api/sessions/:id/events         - Run one turn
 * - POST /api/sessions/:id/assistant-text - Record an assistant utterance
 * - POST /api/sessions/:id/barge-in       - Record an interruption
 * - GET  /api/sessions/:id/opening        - Instructions for the opening line
 * - POST /api/sessions/:id/rebuild        - Replay the timeline into a fresh snapshot
 *
 * Engine errors propagate to the global error handler, which maps them to
 * HTTP statuses.
 *
 * @example
 * ```bash
 * curl -X POST http://localhost:3000/api/sessions \
 *   -H 'Content-Type: application/json' -d '{"entryId":"opportunity-cost"}'
 *
 * curl -X POST http://localhost:3000/api/sessions/sess_.../events \
 *   -H 'Content-Type: application/json' -d '{"text":"hello","eventId":"evt-1"}'
 * ```
 */

import { Hono } from 'hono';
import type { Orchestrator } from '@/core/orchestrator';
import { parseJsonBody } from '../middleware/validate';
import { assistantTextSchema, inboundEventSchema, startSessionSchema } from '../types';
import { success } from '../utils/response';

export function sessionsRoutes(orchestrator: Orchestrator): Hono {
  const router = new Hono();

  router.post('/', async (c) => {
    const body = await parseJsonBody(c, startSessionSchema);
    const result = await orchestrator.startSession(body.entryId);
    return success(c, result, 201);
  });

  router.get('/:id', async (c) => {
    return success(c, await orchestrator.getSession(c.req.param('id')));
  });

  router.get('/:id/timeline', async (c) => {
    return success(c, await orchestrator.getTimeline(c.req.param('id')));
  });

  /**
   * The request's abort signal is handed to the orchestrator: a client that
   * disconnects before the input is recorded gets nothing recorded.
   */
  router.post('/:id/events', async (c) => {
    const body = await parseJsonBody(c, inboundEventSchema);
    const result = await orchestrator.onEvent(c.req.param('id'), body, { signal: c.req.raw.signal });
    return success(c, result);
  });

  router.post('/:id/assistant-text', async (c) => {
    const body = await parseJsonBody(c, assistantTextSchema);
    const state = await orchestrator.recordAssistantText(c.req.param('id'), body.text, body.role);
    return success(c, state, 201);
  });

  router.post('/:id/barge-in', async (c) => {
    const seq = await orchestrator.recordBargeIn(c.req.param('id'));
    return success(c, { seq }, 201);
  });

  router.get('/:id/opening', async (c) => {
    return success(c, await orchestrator.openingInstructions(c.req.param('id')));
  });

  router.post('/:id/rebuild', async (c) => {
    return success(c, await orchestrator.rebuildSession(c.req.param('id')));
  });

  return router;
}
