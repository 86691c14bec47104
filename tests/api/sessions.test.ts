/**
 * Sessions API Endpoint Tests
 *
 * Drives the Hono app with `app.request` over an in-memory engine.
 *
 * Endpoints tested:
 * - POST /api/sessions                    - Start a session
 * - GET  /api/sessions/:id                - Snapshot
 * - GET  /api/sessions/:id/timeline       - Timeline
 * - POST /api/sessions/:id/events         - Run a turn
 * - POST /api/sessions/:id/assistant-text - Record an assistant utterance
 * - POST /api/sessions/:id/barge-in       - Record an interruption
 * - GET  /api/sessions/:id/opening        - Opening instructions
 * - POST /api/sessions/:id/rebuild        - Rebuild from the timeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import type { ApiError } from '../../src/api/types';
import { STUB_REPLY_TEXT } from '../../src/core/orchestrator';
import { createTestApp, createTestEngine, getJsonResponse } from '../setup';

/** JSON envelope as it arrives over the wire; dates are ISO strings */
interface Envelope<T = unknown> {
  success: boolean;
  data: T;
  error?: ApiError;
}

interface StartedBody {
  sessionId: string;
  state: { beat: string };
  diagnose: unknown[];
}

interface TurnBody {
  assistant: { text: string; role: string; quiz: unknown };
  debug: { directorPlan: { nextBeat: string } };
}

interface SnapshotBody {
  beat: string;
  outputClockSec: number;
  turns: { role: string; text: string; timestamp: string }[];
}

interface TimelineEntryBody {
  seq: number;
  clientTimestamp: string;
  serverTimestamp: string;
}

interface OpeningBody {
  directorPlan: { nextRole: string };
  actorPrompt: { instructions: string };
}

function postJson(app: Hono, path: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    })
  );
}

describe('Sessions API', () => {
  let app: Hono;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    app = createTestApp(createTestEngine());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function startSession(): Promise<string> {
    const response = await postJson(app, '/api/sessions', { entryId: 'test-entry' });
    const json = await getJsonResponse<Envelope<StartedBody>>(response);
    return json.data.sessionId;
  }

  // ==========================================================================
  // POST /api/sessions
  // ==========================================================================
  describe('POST /api/sessions', () => {
    it('should start a session', async () => {
      const response = await postJson(app, '/api/sessions', { entryId: 'test-entry' });
      const json = await getJsonResponse<Envelope<StartedBody>>(response);

      expect(response.status).toBe(201);
      expect(json.success).toBe(true);
      expect(json.data.sessionId).toBe('sess_test_1');
      expect(json.data.state.beat).toBe('cold_open');
      expect(json.data.diagnose).toHaveLength(1);
    });

    it('should reject a body without entryId', async () => {
      const response = await postJson(app, '/api/sessions', {});
      const json = await getJsonResponse<Envelope>(response);

      expect(response.status).toBe(400);
      expect(json.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: [{ path: 'entryId', message: 'Required' }],
      });
    });

    it('should reject a body that is not JSON', async () => {
      const response = await postJson(app, '/api/sessions', 'not json');
      const json = await getJsonResponse<Envelope>(response);

      expect(response.status).toBe(400);
      expect(json.error?.code).toBe('INVALID_JSON');
    });

    it('should return 404 for an unknown entry', async () => {
      const response = await postJson(app, '/api/sessions', { entryId: 'nope' });
      const json = await getJsonResponse<Envelope>(response);

      expect(response.status).toBe(404);
      expect(json.error).toEqual({
        code: 'NOT_FOUND',
        message: "Entry 'nope' not found",
        details: { resource: 'Entry', id: 'nope' },
      });
    });
  });

  // ==========================================================================
  // POST /api/sessions/:id/events
  // ==========================================================================
  describe('POST /api/sessions/:id/events', () => {
    it('should run a turn and return the reply with its plan', async () => {
      const sessionId = await startSession();

      const response = await postJson(app, `/api/sessions/${sessionId}/events`, { text: 'hello', eventId: 'evt-1' });
      const json = await getJsonResponse<Envelope<TurnBody>>(response);

      expect(response.status).toBe(200);
      expect(json.data.assistant.text).toBe(STUB_REPLY_TEXT);
      expect(json.data.assistant.role).toBe('host');
      expect(json.data.assistant.quiz).toBeNull();
      expect(json.data.debug.directorPlan.nextBeat).toBe('twist');
    });

    it('should return the same reply for a repeated eventId', async () => {
      const sessionId = await startSession();
      const path = `/api/sessions/${sessionId}/events`;

      const first = await getJsonResponse<Envelope<TurnBody>>(await postJson(app, path, { text: 'hello', eventId: 'evt-1' }));
      const second = await getJsonResponse<Envelope<TurnBody>>(await postJson(app, path, { text: 'hello', eventId: 'evt-1' }));
      const timeline = await getJsonResponse<Envelope<TimelineEntryBody[]>>(await app.request(`/api/sessions/${sessionId}/timeline`));

      expect(second.data.assistant).toEqual(first.data.assistant);
      expect(timeline.data).toHaveLength(4);
    });

    it('should keep the client timestamp and stamp the server one', async () => {
      const sessionId = await startSession();

      await postJson(app, `/api/sessions/${sessionId}/events`, {
        text: 'hello',
        clientTimestamp: '2025-03-01T09:59:00+00:00',
      });
      const timeline = await getJsonResponse<Envelope<TimelineEntryBody[]>>(await app.request(`/api/sessions/${sessionId}/timeline`));

      expect(timeline.data[1].clientTimestamp).toBe('2025-03-01T09:59:00.000Z');
      expect(timeline.data[1].serverTimestamp).toBe('2025-03-01T10:00:00.000Z');
    });

    it('should reject a malformed client timestamp', async () => {
      const sessionId = await startSession();

      const response = await postJson(app, `/api/sessions/${sessionId}/events`, {
        text: 'hello',
        clientTimestamp: 'yesterday',
      });

      expect(response.status).toBe(400);
    });

    it('should reject an event type only the engine records', async () => {
      const sessionId = await startSession();

      const response = await postJson(app, `/api/sessions/${sessionId}/events`, {
        type: 'director_plan',
        text: 'hello',
      });
      const json = await getJsonResponse<Envelope>(response);
      const timeline = await getJsonResponse<Envelope<TimelineEntryBody[]>>(await app.request(`/api/sessions/${sessionId}/timeline`));

      expect(response.status).toBe(400);
      expect(json.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: [
          { path: 'type', message: 'type must not be one of assistant_text, director_plan, session_started, barge_in' },
        ],
      });
      expect(timeline.data).toHaveLength(1);
    });

    it('should return 404 for an unknown session', async () => {
      const response = await postJson(app, '/api/sessions/sess_missing/events', { text: 'hello' });
      const json = await getJsonResponse<Envelope>(response);

      expect(response.status).toBe(404);
      expect(json.error?.message).toBe("Session 'sess_missing' not found");
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================
  describe('GET /api/sessions/:id', () => {
    it('should return the snapshot', async () => {
      const sessionId = await startSession();
      await postJson(app, `/api/sessions/${sessionId}/events`, { text: 'hello' });

      const json = await getJsonResponse<Envelope<SnapshotBody>>(await app.request(`/api/sessions/${sessionId}`));

      expect(json.data.beat).toBe('twist');
      expect(json.data.turns).toHaveLength(2);
      expect(json.data.outputClockSec).toBe(0);
    });

    it('should return 404 for an unknown session', async () => {
      const response = await app.request('/api/sessions/sess_missing');
      expect(response.status).toBe(404);
    });
  });

  describe('GET /api/sessions/:id/opening', () => {
    it('should return the opening plan and instructions', async () => {
      const sessionId = await startSession();

      const json = await getJsonResponse<Envelope<OpeningBody>>(await app.request(`/api/sessions/${sessionId}/opening`));

      expect(json.data.directorPlan.nextRole).toBe('host');
      expect(json.data.actorPrompt.instructions.startsWith('[Role Definition]\n')).toBe(true);
    });
  });

  // ==========================================================================
  // Out-of-band facts and rebuild
  // ==========================================================================
  describe('POST /api/sessions/:id/assistant-text', () => {
    it('should record the utterance', async () => {
      const sessionId = await startSession();

      const response = await postJson(app, `/api/sessions/${sessionId}/assistant-text`, {
        text: 'Welcome.',
        role: 'host',
      });
      const json = await getJsonResponse<Envelope<SnapshotBody>>(response);

      expect(response.status).toBe(201);
      expect(json.data.turns).toEqual([{ role: 'host', text: 'Welcome.', timestamp: '2025-03-01T10:00:00.000Z' }]);
    });

    it('should reject empty text', async () => {
      const sessionId = await startSession();
      const response = await postJson(app, `/api/sessions/${sessionId}/assistant-text`, { text: '' });
      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/sessions/:id/barge-in', () => {
    it('should return the seq of the recorded fact', async () => {
      const sessionId = await startSession();

      const response = await app.request(`/api/sessions/${sessionId}/barge-in`, { method: 'POST' });
      const json = await getJsonResponse<Envelope<{ seq: number }>>(response);

      expect(response.status).toBe(201);
      expect(json.data).toEqual({ seq: 2 });
    });
  });

  describe('POST /api/sessions/:id/rebuild', () => {
    it('should return the rebuilt snapshot', async () => {
      const sessionId = await startSession();
      await postJson(app, `/api/sessions/${sessionId}/events`, { text: 'hello' });
      const before = await getJsonResponse<Envelope<SnapshotBody>>(await app.request(`/api/sessions/${sessionId}`));

      const response = await app.request(`/api/sessions/${sessionId}/rebuild`, { method: 'POST' });
      const json = await getJsonResponse<Envelope<SnapshotBody>>(response);

      expect(response.status).toBe(200);
      expect(json.data).toEqual(before.data);
    });
  });
});
