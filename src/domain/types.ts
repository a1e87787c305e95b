export const ISSUE_TYPES = [
  'refund_request',
  'damaged_item',
  'late_delivery',
  'missing_item',
  'duplicate_charge',
  'wrong_item',
  'defective_product',
] as const;

/** Shape of every order id in the lookup tables. */
export const ORDER_ID_PATTERN = /^ORD\d{4}$/;

export type IssueType = (typeof ISSUE_TYPES)[number];

/** Classification outcome; `unknown` when no rule matched. */
export type ClassifiedIssueType = IssueType | 'unknown';

export function isIssueType(value: string): value is IssueType {
  return ISSUE_TYPES.some((issueType) => issueType === value);
}

export function isClassifiedIssueType(value: string): value is ClassifiedIssueType {
  return value === 'unknown' || isIssueType(value);
}

export interface OrderItem {
  name: string;
  quantity: number;
}

export interface Order {
  orderId: string;
  customerName: string;
  status: string;
  items: OrderItem[];
}

export interface IssueRule {
  keyword: string;
  issueType: IssueType;
}

export interface ReplyTemplate {
  issueType: IssueType;
  template: string;
}

export interface IssueClassification {
  issueType: ClassifiedIssueType;
  evidence: string;
}

export interface TriageInput {
  ticketText: string;
  orderId?: string;
}

export interface TriageState {
  readonly ticketText: string;
  orderId: string | null;
  issueType: ClassifiedIssueType | null;
  evidence: string | null;
  order: Order | null;
  recommendation: string | null;
  replyText: string | null;
  error: string | null;
}

export interface TriageResult {
  orderId: string | null;
  issueType: ClassifiedIssueType;
  evidence: string;
  recommendation: string;
  order: Order | null;
  replyText: string;
  error: string | null;
}
