import type { Order, TriageResult } from '../domain/types.js';

export const GREETING_MESSAGE =
  "Hi! I'm the support triage agent. Tell me about your issue and include your order ID " +
  "(e.g. ORD1001) and I'll help you out.";

export const SAMPLE_PROMPTS = [
  'My order ORD1001 arrived broken',
  'I want a refund for ORD1004',
  'ORD1002 has not arrived yet',
  'Wrong item shipped for ORD1006',
] as const;

/** Markdown reply shown to the person chatting, built from a triage result. */
export function formatTriageMessage(result: TriageResult): string {
  if (result.error) {
    return [
      `**Could not process your request:** ${result.error}`,
      '',
      'Please include a valid order ID (e.g. ORD1001) in your message.',
    ].join('\n');
  }

  const lines: string[] = [
    `**Issue classified:** \`${result.issueType}\``,
    `**Evidence:** ${result.evidence}`,
    '',
  ];

  if (result.orderId) {
    lines.push(...orderLines(result.orderId, result.order));
  } else {
    lines.push('**Order:** N/A - no order ID found in message');
  }

  lines.push(
    '',
    `**Recommendation:** ${result.recommendation}`,
    '',
    '---',
    '**Draft reply to customer:**',
    `> ${result.replyText}`,
  );

  return lines.join('\n');
}

export function formatItems(order: Order): string {
  return order.items.map((item) => `${item.name} (x${item.quantity})`).join(', ');
}

function orderLines(orderId: string, order: Order | null): string[] {
  if (!order) {
    return [`**Order:** ${orderId}`];
  }

  const lines = [`**Order:** ${orderId} - ${order.customerName} - *${order.status}*`];
  if (order.items.length > 0) {
    lines.push(`**Items:** ${formatItems(order)}`);
  }
  return lines;
}
