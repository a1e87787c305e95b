import type { LookupStore } from '../domain/lookup-store.js';
import { getDefaultLookupStore } from '../domain/mock-data.js';
import type { TriageResult } from '../domain/types.js';
import { logger } from '../observability/logger.js';
import { executeTriage, type TriageRun } from './triage-pipeline.js';

export class TriageInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TriageInputError';
  }
}

export type TriageRunner = (ticketText: string, orderId?: string | null) => TriageResult;

interface TriageRunnerOptions {
  onRun?: (run: TriageRun) => void;
}

/**
 * Bind the pipeline to a lookup store. Each call builds fresh state, so the
 * runner can be shared freely between callers.
 */
export function createTriageRunner(store: LookupStore, options: TriageRunnerOptions = {}): TriageRunner {
  return (ticketText, orderId) => {
    if (ticketText.length === 0) {
      throw new TriageInputError('Ticket text is required');
    }

    const run = executeTriage(store, { ticketText, orderId: orderId ?? undefined });
    notifyRun(run, options.onRun);
    return run.result;
  };
}

let defaultRunner: TriageRunner | undefined;

/** Triage a ticket against the process-wide lookup store. */
export function runTriage(ticketText: string, orderId?: string | null): TriageResult {
  defaultRunner ??= createTriageRunner(getDefaultLookupStore());
  return defaultRunner(ticketText, orderId);
}

function notifyRun(run: TriageRun, onRun: TriageRunnerOptions['onRun']): void {
  if (!onRun) {
    return;
  }

  try {
    onRun(run);
  } catch (error: unknown) {
    logger.error({ err: error }, 'Triage run observer failed');
  }
}
