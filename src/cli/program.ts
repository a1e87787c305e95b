import { Command, InvalidArgumentError } from 'commander';
import type { LookupStore } from '../domain/lookup-store.js';
import type { TriageResult } from '../domain/types.js';
import type { TriageRunner } from '../services/triage.js';
import { formatItems, formatTriageMessage } from '../services/triage-message.js';

export const SAMPLE_TICKETS = [
  'Hi, my order ORD1001 arrived broken. I need help.',
  'I want a refund for ORD1004.',
  'My package is late, no idea what my order number is.',
] as const;

interface ProgramDeps {
  store: LookupStore;
  runTriage: TriageRunner;
  sampleOrderLimit: number;
  write: (line: string) => void;
}

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  program
    .name('triage')
    .description('Classify support tickets, look up their orders and draft replies');

  program
    .command('run')
    .description('Triage a single ticket')
    .argument('<text...>', 'Ticket text')
    .option('-o, --order-id <id>', 'Order id to use instead of extracting one from the text')
    .option('--json', 'Print the raw result as JSON')
    .action((words: string[], options: { orderId?: string; json?: boolean }) => {
      const result = deps.runTriage(words.join(' '), options.orderId);
      deps.write(options.json ? JSON.stringify(result, null, 2) : formatTriageMessage(result));
    });

  program
    .command('samples')
    .description('Run the built-in sample tickets and print every result field')
    .action(() => {
      for (const sample of SAMPLE_TICKETS) {
        deps.write(`-- Input: ${sample}`);
        for (const line of describeResult(deps.runTriage(sample))) {
          deps.write(`   ${line}`);
        }
        deps.write('');
      }
    });

  program
    .command('orders')
    .description('List order ids you can mention in a ticket')
    .option('-l, --limit <n>', 'How many orders to list', parsePositiveInt)
    .action((options: { limit?: number }) => {
      for (const order of deps.store.listOrders(options.limit ?? deps.sampleOrderLimit)) {
        deps.write(`${order.orderId}  ${order.customerName}  [${order.status}]  ${formatItems(order)}`);
      }
    });

  return program;
}

export function describeResult(result: TriageResult): string[] {
  return [
    `order_id: ${result.orderId ?? 'null'}`,
    `issue_type: ${result.issueType}`,
    `evidence: ${result.evidence}`,
    `recommendation: ${result.recommendation}`,
    `order: ${result.order ? JSON.stringify(result.order) : 'null'}`,
    `reply_text: ${result.replyText}`,
    `error: ${result.error ?? 'null'}`,
  ];
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
