/**
 * Inbound event normalization: fills in what transports may leave out and
 * stamps what only the server may decide.
 */

import type { InboundEvent, UnsequencedEvent } from '@/core/models';

export const DEFAULT_EVENT_TYPE = 'user_message';

/**
 * @example
 * ```typescript
 * normalizeEvent('sess_1', { text: 'hello' }, now);
 * // { sessionId: 'sess_1', type: 'user_message', text: 'hello',
 * //   clientTimestamp: now, serverTimestamp: now }
 * ```
 */
export function normalizeEvent(sessionId: string, inbound: InboundEvent, now: Date): UnsequencedEvent {
  const event: UnsequencedEvent = {
    sessionId,
    type: inbound.type || DEFAULT_EVENT_TYPE,
    text: inbound.text ?? '',
    clientTimestamp: inbound.clientTimestamp ?? now,
    serverTimestamp: now,
  };

  if (inbound.eventId) event.eventId = inbound.eventId;
  if (inbound.turnId) event.turnId = inbound.turnId;
  if (inbound.questionId) event.questionId = inbound.questionId;
  if (inbound.answer !== undefined) event.answer = inbound.answer;

  return event;
}
