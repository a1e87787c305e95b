import type { LookupStore } from '../domain/lookup-store.js';
import type { ClassifiedIssueType, Order } from '../domain/types.js';

const PLACEHOLDER_PATTERN = /\{\{(customer_name|order_id)\}\}/g;
const DEFAULT_CUSTOMER_NAME = 'Customer';

export interface TemplateValues {
  customerName: string;
  orderId: string;
}

export interface ComposeReplyInput {
  issueType: ClassifiedIssueType;
  order: Order | null;
  orderId: string | null;
}

/**
 * Literal substitution of the two known placeholders in a single pass, so a
 * substituted value is never scanned again. Any other `{{...}}` token stays as
 * written.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (_placeholder, name: string) =>
    name === 'customer_name' ? values.customerName : values.orderId,
  );
}

export function composeReply(store: LookupStore, input: ComposeReplyInput): string {
  const template = store.getTemplate(input.issueType);
  return fillTemplate(template, {
    customerName: input.order?.customerName ?? DEFAULT_CUSTOMER_NAME,
    orderId: input.order?.orderId ?? input.orderId ?? '',
  });
}

export function recommend(store: LookupStore, issueType: ClassifiedIssueType): string {
  return store.getRecommendation(issueType);
}
