import { LookupStore, type LookupTables } from '../src/domain/lookup-store.js';

export function makeTables(): LookupTables {
  return {
    orders: [
      {
        orderId: 'ORD1001',
        customerName: 'Jane Doe',
        status: 'delivered',
        items: [{ name: 'Ceramic Mug', quantity: 2 }],
      },
      {
        orderId: 'ORD2002',
        customerName: 'Raj Kumar',
        status: 'shipped',
        items: [
          { name: 'Desk Chair', quantity: 1 },
          { name: 'Cushion', quantity: 2 },
        ],
      },
    ],
    issueRules: [
      { keyword: 'broken', issueType: 'damaged_item' },
      { keyword: 'broke', issueType: 'defective_product' },
      { keyword: 'late', issueType: 'late_delivery' },
      { keyword: 'refund', issueType: 'refund_request' },
    ],
    replyTemplates: [
      { issueType: 'damaged_item', template: 'Hi {{customer_name}}, order {{order_id}} will be replaced.' },
      { issueType: 'late_delivery', template: 'Hi {{customer_name}}, we are tracking your package.' },
      { issueType: 'refund_request', template: 'Refund for {{order_id}} is on its way.' },
    ],
  };
}

export function makeStore(): LookupStore {
  return new LookupStore(makeTables());
}
