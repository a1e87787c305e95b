import type { LookupStore } from '../domain/lookup-store.js';
import { ORDER_ID_PATTERN, type Order } from '../domain/types.js';

const ORDER_ID_IN_TEXT = /ORD\d{4}/i;

export type OrderResolution =
  | { kind: 'found'; order: Order }
  | { kind: 'not_found'; orderId: string; error: string }
  | { kind: 'invalid'; orderId: string; error: string };

/** First `ORD####` occurrence in the text, uppercased; case-insensitive. */
export function extractOrderId(text: string): string | null {
  const found = ORDER_ID_IN_TEXT.exec(text)?.[0];
  return found ? found.toUpperCase() : null;
}

/**
 * A non-empty supplied id wins and is used as given; otherwise the id is
 * pulled from the ticket text.
 */
export function resolveOrderId(ticketText: string, suppliedOrderId?: string | null): string | null {
  if (suppliedOrderId) {
    return suppliedOrderId;
  }
  return extractOrderId(ticketText);
}

export function isValidOrderId(orderId: string): boolean {
  return ORDER_ID_PATTERN.test(orderId);
}

export function resolveOrder(store: LookupStore, orderId: string): OrderResolution {
  if (!isValidOrderId(orderId)) {
    return {
      kind: 'invalid',
      orderId,
      error: `Order id '${orderId}' is not a valid order id (expected ORD followed by four digits)`,
    };
  }

  const order = store.getOrder(orderId);
  if (!order) {
    return { kind: 'not_found', orderId, error: `Order ${orderId} not found` };
  }

  return { kind: 'found', order };
}
