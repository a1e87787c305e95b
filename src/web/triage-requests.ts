import { z } from 'zod';
import type { TriageResult } from '../domain/types.js';
import type { TriageRunner } from '../services/triage.js';
import { GREETING_MESSAGE, formatTriageMessage } from '../services/triage-message.js';

export const triageRequestSchema = z.object({
  ticketText: z.string().trim().min(1),
  orderId: z.string().trim().min(1).optional(),
});

export const listOrdersQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional(),
});

const socketMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ticket'),
    text: z.string().trim().min(1),
    orderId: z.string().trim().min(1).optional(),
  }),
  z.object({ type: z.literal('ping') }),
]);

export interface TriageResponse {
  result: TriageResult;
  message: string;
}

export type TriageSocketReply =
  | { type: 'greeting'; message: string }
  | ({ type: 'triage_result' } & TriageResponse)
  | { type: 'pong' }
  | { type: 'error'; error: string };

export function buildTriageResponse(result: TriageResult): TriageResponse {
  return { result, message: formatTriageMessage(result) };
}

export function greetingReply(): TriageSocketReply {
  return { type: 'greeting', message: GREETING_MESSAGE };
}

/**
 * Handle one chat frame. Every ticket is triaged on its own; nothing is kept
 * between frames of the same socket.
 */
export function handleSocketMessage(raw: string, runTriage: TriageRunner): TriageSocketReply {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { type: 'error', error: 'Message is not valid JSON' };
  }

  const parsed = socketMessageSchema.safeParse(payload);
  if (!parsed.success) {
    return { type: 'error', error: 'Invalid message' };
  }

  switch (parsed.data.type) {
    case 'ping':
      return { type: 'pong' };
    case 'ticket': {
      const result = runTriage(parsed.data.text, parsed.data.orderId);
      return { type: 'triage_result', ...buildTriageResponse(result) };
    }
  }
}
