import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { env } from '../config/env.js';
import { LookupStore } from './lookup-store.js';
import { ISSUE_TYPES, ORDER_ID_PATTERN } from './types.js';
import type { IssueRule, Order, ReplyTemplate } from './types.js';

export class MockDataError extends Error {
  constructor(
    readonly file: string,
    message: string,
  ) {
    super(`${path.basename(file)}: ${message}`);
    this.name = 'MockDataError';
  }
}

const issueTypeSchema = z.enum(ISSUE_TYPES);

const ordersSchema = z
  .array(
    z.object({
      order_id: z.string().regex(ORDER_ID_PATTERN, 'order_id must be ORD followed by four digits'),
      customer_name: z.string().min(1),
      status: z.string().min(1),
      items: z.array(
        z.object({
          name: z.string().min(1),
          quantity: z.number().int().positive(),
        }),
      ),
    }),
  )
  .superRefine((orders, ctx) => {
    const seen = new Set<string>();
    orders.forEach((order, index) => {
      if (seen.has(order.order_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'order_id'],
          message: `Duplicate order_id ${order.order_id}`,
        });
      }
      seen.add(order.order_id);
    });
  });

const issuesSchema = z.array(
  z.object({
    keyword: z
      .string()
      .min(1)
      .refine((keyword) => keyword === keyword.toLowerCase(), 'keyword must be lowercase'),
    issue_type: issueTypeSchema,
  }),
);

const repliesSchema = z
  .array(
    z.object({
      issue_type: issueTypeSchema,
      template: z.string().min(1),
    }),
  )
  .superRefine((replies, ctx) => {
    const seen = new Set<string>();
    replies.forEach((reply, index) => {
      if (seen.has(reply.issue_type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'issue_type'],
          message: `Duplicate template for ${reply.issue_type}`,
        });
      }
      seen.add(reply.issue_type);
    });
  });

export function loadOrders(dir: string): Order[] {
  return readCollection(path.join(dir, 'orders.json'), ordersSchema).map((order) => ({
    orderId: order.order_id,
    customerName: order.customer_name,
    status: order.status,
    items: order.items.map((item) => ({ name: item.name, quantity: item.quantity })),
  }));
}

export function loadIssueRules(dir: string): IssueRule[] {
  return readCollection(path.join(dir, 'issues.json'), issuesSchema).map((rule) => ({
    keyword: rule.keyword,
    issueType: rule.issue_type,
  }));
}

export function loadReplyTemplates(dir: string): ReplyTemplate[] {
  return readCollection(path.join(dir, 'replies.json'), repliesSchema).map((reply) => ({
    issueType: reply.issue_type,
    template: reply.template,
  }));
}

export function loadLookupStore(dir: string): LookupStore {
  return new LookupStore({
    orders: loadOrders(dir),
    issueRules: loadIssueRules(dir),
    replyTemplates: loadReplyTemplates(dir),
  });
}

let defaultStore: LookupStore | undefined;

/** Process-wide store, loaded from the configured directory on first use. */
export function getDefaultLookupStore(): LookupStore {
  defaultStore ??= loadLookupStore(env.triage.mockDataDir);
  return defaultStore;
}

function readCollection<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MockDataError(file, `cannot read file (${message})`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MockDataError(file, `invalid JSON (${message})`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MockDataError(file, details);
  }

  return parsed.data;
}
