import type { Counter, Histogram } from '@opentelemetry/api';
import { PatchResult, TierLabel } from '../types';
import { getMeter, isTelemetryEnabled } from './telemetry';

let classificationCounter: Counter | null = null;
let proposalCounter: Counter | null = null;
let transitionCounter: Counter | null = null;
let patchCounter: Counter | null = null;

let applyDurationHistogram: Histogram | null = null;

/**
 * Create metric instruments. Call after initTelemetry().
 */
export function initMetrics(): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const meter = getMeter();

  classificationCounter = meter.createCounter('governance.classification.count', {
    description: 'Paths classified, by tier',
    unit: 'count',
  });

  proposalCounter = meter.createCounter('governance.proposal.count', {
    description: 'Proposals created, by tier',
    unit: 'count',
  });

  transitionCounter = meter.createCounter('governance.transition.count', {
    description: 'Lifecycle transitions, by target state',
    unit: 'count',
  });

  patchCounter = meter.createCounter('governance.patch.count', {
    description: 'Apply attempts, by outcome',
    unit: 'count',
  });

  applyDurationHistogram = meter.createHistogram('governance.apply.duration', {
    description: 'Duration of one apply attempt in milliseconds',
    unit: 'ms',
  });
}

export function recordClassification(label: TierLabel): void {
  classificationCounter?.add(1, { tier: label });
}

export function recordProposal(label: TierLabel): void {
  proposalCounter?.add(1, { tier: label });
}

export function recordTransition(toState: string): void {
  transitionCounter?.add(1, { to_state: toState });
}

export function recordPatch(result: PatchResult, durationMs: number): void {
  const outcome = result.ok ? 'applied' : result.error;
  patchCounter?.add(1, { outcome, dry_run: String(result.ok && result.dryRun) });
  applyDurationHistogram?.record(durationMs, { outcome });
}
