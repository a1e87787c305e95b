import type { ClassifiedIssueType } from './types.js';

export const RECOMMENDATIONS: Readonly<Record<ClassifiedIssueType, string>> = Object.freeze({
  refund_request: 'Process refund for the customer',
  damaged_item: 'Send replacement item to customer',
  late_delivery: 'Track package and provide updated ETA',
  missing_item: 'Investigate and ship missing item',
  duplicate_charge: 'Refund the duplicate charge',
  wrong_item: 'Arrange return and send correct item',
  defective_product: 'Honor warranty and replace product',
  unknown: 'Escalate to human agent for review',
});

export const DEFAULT_REPLY_TEMPLATE = 'Hi {{customer_name}}, we are reviewing order {{order_id}}.';
