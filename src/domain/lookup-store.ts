import { DEFAULT_REPLY_TEMPLATE, RECOMMENDATIONS } from './recommendations.js';
import { isClassifiedIssueType, type IssueRule, type Order, type OrderItem, type ReplyTemplate } from './types.js';

type FrozenOrder = Readonly<Omit<Order, 'items'>> & { readonly items: readonly Readonly<OrderItem>[] };

export interface LookupTables {
  orders: Order[];
  issueRules: IssueRule[];
  replyTemplates: ReplyTemplate[];
}

/**
 * Read-only tables behind the triage pipeline.
 *
 * Everything is copied and frozen at construction, so a single instance can be
 * shared by any number of concurrent triage runs.
 */
export class LookupStore {
  private readonly orders: ReadonlyMap<string, FrozenOrder>;
  private readonly orderSequence: readonly FrozenOrder[];
  private readonly issueRules: readonly Readonly<IssueRule>[];
  private readonly templates: ReadonlyMap<string, string>;

  constructor(tables: LookupTables) {
    this.orderSequence = Object.freeze(tables.orders.map((order) => freezeOrder(order)));
    this.orders = new Map(this.orderSequence.map((order): [string, FrozenOrder] => [order.orderId, order]));
    this.issueRules = Object.freeze(tables.issueRules.map((rule) => Object.freeze({ ...rule })));
    this.templates = new Map(
      tables.replyTemplates.map((reply): [string, string] => [reply.issueType, reply.template]),
    );
  }

  getOrder(orderId: string): Order | undefined {
    const order = this.orders.get(orderId);
    return order ? cloneOrder(order) : undefined;
  }

  listOrders(limit?: number): Order[] {
    const selected = limit === undefined ? this.orderSequence : this.orderSequence.slice(0, Math.max(0, limit));
    return selected.map((order) => cloneOrder(order));
  }

  /** First rule, in table order, whose keyword occurs in the already lowercased text. */
  matchIssue(normalizedText: string): IssueRule | undefined {
    const rule = this.issueRules.find((candidate) => normalizedText.includes(candidate.keyword));
    return rule ? { ...rule } : undefined;
  }

  getTemplate(issueType: string): string {
    return this.templates.get(issueType) ?? DEFAULT_REPLY_TEMPLATE;
  }

  getRecommendation(issueType: string): string {
    return isClassifiedIssueType(issueType) ? RECOMMENDATIONS[issueType] : RECOMMENDATIONS.unknown;
  }

  get ruleCount(): number {
    return this.issueRules.length;
  }
}

function freezeOrder(order: Order): FrozenOrder {
  return Object.freeze({
    ...order,
    items: Object.freeze(order.items.map((item) => Object.freeze({ ...item }))),
  });
}

function cloneOrder(order: FrozenOrder): Order {
  return {
    ...order,
    items: order.items.map((item) => ({ ...item })),
  };
}
