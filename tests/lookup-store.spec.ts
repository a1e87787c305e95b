import { describe, expect, it } from 'vitest';
import { LookupStore } from '../src/domain/lookup-store.js';
import { DEFAULT_REPLY_TEMPLATE } from '../src/domain/recommendations.js';
import { makeStore, makeTables } from './fixtures.js';

describe('LookupStore', () => {
  it('finds orders by exact id', () => {
    const store = makeStore();

    expect(store.getOrder('ORD1001')).toEqual({
      orderId: 'ORD1001',
      customerName: 'Jane Doe',
      status: 'delivered',
      items: [{ name: 'Ceramic Mug', quantity: 2 }],
    });
    expect(store.getOrder('ord1001')).toBeUndefined();
    expect(store.getOrder('ORD9999')).toBeUndefined();
  });

  it('hands out copies so callers cannot change stored orders', () => {
    const store = makeStore();

    const order = store.getOrder('ORD1001');
    expect(order).toBeDefined();
    if (order) {
      order.customerName = 'Someone Else';
      order.items[0] = { name: 'Teapot', quantity: 1 };
    }

    expect(store.getOrder('ORD1001')?.customerName).toBe('Jane Doe');
    expect(store.getOrder('ORD1001')?.items).toEqual([{ name: 'Ceramic Mug', quantity: 2 }]);
  });

  it('is not affected by later changes to the source tables', () => {
    const tables = makeTables();
    const store = new LookupStore(tables);

    tables.orders.pop();
    tables.issueRules.unshift({ keyword: 'help', issueType: 'missing_item' });

    expect(store.getOrder('ORD2002')?.customerName).toBe('Raj Kumar');
    expect(store.matchIssue('help, it is late')?.issueType).toBe('late_delivery');
  });

  it('lists orders in table order with an optional limit', () => {
    const store = makeStore();

    expect(store.listOrders().map((order) => order.orderId)).toEqual(['ORD1001', 'ORD2002']);
    expect(store.listOrders(1).map((order) => order.orderId)).toEqual(['ORD1001']);
    expect(store.listOrders(0)).toEqual([]);
  });

  it('returns the first rule in table order whose keyword occurs in the text', () => {
    const store = makeStore();

    expect(store.matchIssue('the handle broke off')).toEqual({ keyword: 'broke', issueType: 'defective_product' });
    expect(store.matchIssue('it broke and now it is broken')).toEqual({ keyword: 'broken', issueType: 'damaged_item' });
    expect(store.matchIssue('all good')).toBeUndefined();
  });

  it('falls back to the default template for types without one', () => {
    const store = makeStore();

    expect(store.getTemplate('damaged_item')).toBe('Hi {{customer_name}}, order {{order_id}} will be replaced.');
    expect(store.getTemplate('wrong_item')).toBe(DEFAULT_REPLY_TEMPLATE);
    expect(store.getTemplate('unknown')).toBe('Hi {{customer_name}}, we are reviewing order {{order_id}}.');
  });

  it('maps issue types to recommendations with an escalation fallback', () => {
    const store = makeStore();

    expect(store.getRecommendation('damaged_item')).toBe('Send replacement item to customer');
    expect(store.getRecommendation('duplicate_charge')).toBe('Refund the duplicate charge');
    expect(store.getRecommendation('unknown')).toBe('Escalate to human agent for review');
    expect(store.getRecommendation('lost_parcel')).toBe('Escalate to human agent for review');
    expect(store.getRecommendation('constructor')).toBe('Escalate to human agent for review');
  });

  it('counts the loaded rules', () => {
    expect(makeStore().ruleCount).toBe(4);
  });
});
