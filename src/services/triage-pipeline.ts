import type { LookupStore } from '../domain/lookup-store.js';
import type { TriageInput, TriageResult, TriageState } from '../domain/types.js';
import { classifyIssue } from './intent.js';
import { resolveOrder, resolveOrderId } from './order-resolver.js';
import { composeReply, recommend } from './reply-composer.js';

// ─── Stage graph ────────────────────────────────────────────────────────────

export type TriageStage = 'ingest' | 'classify' | 'fetch' | 'compose';

export type Transition =
  | { to: 'ingest' }
  | { to: 'classify' }
  | { to: 'fetch'; orderId: string }
  | { to: 'compose' }
  | { to: 'end' };

type StageCall = Exclude<Transition, { to: 'end' }>;

/** Allowed successors of each stage. `classify` is the only branch. */
export const TRIAGE_TRANSITIONS: Readonly<Record<TriageStage, readonly Transition['to'][]>> = {
  ingest: ['classify'],
  classify: ['fetch', 'compose'],
  fetch: ['compose'],
  compose: ['end'],
};

type StatePatch = Partial<Omit<TriageState, 'ticketText'>>;

interface StageOutcome {
  patch: StatePatch;
  next: Transition;
}

export interface TriageRun {
  result: TriageResult;
  stages: TriageStage[];
}

const SET_ONCE_FIELDS = ['orderId', 'issueType', 'error'] as const;

// ─── Runner ─────────────────────────────────────────────────────────────────

export function createTriageState(ticketText: string): TriageState {
  return {
    ticketText,
    orderId: null,
    issueType: null,
    evidence: null,
    order: null,
    recommendation: null,
    replyText: null,
    error: null,
  };
}

/**
 * Walk the stage graph once for a single ticket. Every stage runs at most
 * once; the returned `stages` list is the path that was taken.
 */
export function executeTriage(store: LookupStore, input: TriageInput): TriageRun {
  const state = createTriageState(input.ticketText);
  const stages: TriageStage[] = [];

  let step: Transition = { to: 'ingest' };
  while (step.to !== 'end') {
    const stage: TriageStage = step.to;
    if (stages.includes(stage)) {
      throw new Error(`Triage stage '${stage}' would run twice`);
    }
    stages.push(stage);

    const outcome = runStage(step, state, store, input);
    applyPatch(state, outcome.patch);
    assertTransitionAllowed(stage, outcome.next);
    step = outcome.next;
  }

  return { result: toResult(state), stages };
}

export function routeAfterClassify(orderId: string | null): Transition {
  return orderId ? { to: 'fetch', orderId } : { to: 'compose' };
}

function runStage(step: StageCall, state: TriageState, store: LookupStore, input: TriageInput): StageOutcome {
  switch (step.to) {
    case 'ingest':
      return ingest(input);
    case 'classify':
      return classify(state, store);
    case 'fetch':
      return fetchOrder(step.orderId, store);
    case 'compose':
      return compose(state, store);
    default: {
      const unreachable: never = step;
      throw new Error(`Unknown triage stage: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ─── Stages ─────────────────────────────────────────────────────────────────

function ingest(input: TriageInput): StageOutcome {
  return {
    patch: { orderId: resolveOrderId(input.ticketText, input.orderId) },
    next: { to: 'classify' },
  };
}

function classify(state: TriageState, store: LookupStore): StageOutcome {
  const { issueType, evidence } = classifyIssue(state.ticketText, store);
  return {
    patch: { issueType, evidence },
    next: routeAfterClassify(state.orderId),
  };
}

function fetchOrder(orderId: string, store: LookupStore): StageOutcome {
  const resolution = resolveOrder(store, orderId);
  const next: Transition = { to: 'compose' };

  switch (resolution.kind) {
    case 'found':
      return { patch: { order: resolution.order }, next };
    case 'not_found':
    case 'invalid':
      return { patch: { error: resolution.error }, next };
  }
}

// Runs on every path, including after a failed lookup.
function compose(state: TriageState, store: LookupStore): StageOutcome {
  const issueType = state.issueType ?? 'unknown';
  return {
    patch: {
      recommendation: recommend(store, issueType),
      replyText: composeReply(store, { issueType, order: state.order, orderId: state.orderId }),
    },
    next: { to: 'end' },
  };
}

// ─── State helpers ──────────────────────────────────────────────────────────

function applyPatch(state: TriageState, patch: StatePatch): void {
  for (const field of SET_ONCE_FIELDS) {
    const incoming = patch[field];
    const current = state[field];
    if (incoming !== undefined && current !== null && incoming !== current) {
      throw new Error(`Triage state field '${field}' is already set`);
    }
  }
  Object.assign(state, patch);
}

function assertTransitionAllowed(stage: TriageStage, next: Transition): void {
  if (!TRIAGE_TRANSITIONS[stage].includes(next.to)) {
    throw new Error(`Invalid triage transition ${stage} -> ${next.to}`);
  }
}

function toResult(state: TriageState): TriageResult {
  if (state.issueType === null || state.evidence === null || state.recommendation === null || state.replyText === null) {
    throw new Error('Triage finished without classifying and composing a reply');
  }

  return {
    orderId: state.orderId,
    issueType: state.issueType,
    evidence: state.evidence,
    recommendation: state.recommendation,
    order: state.order,
    replyText: state.replyText,
    error: state.error,
  };
}
