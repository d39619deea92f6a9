/**
 * Observability Module
 *
 * OpenTelemetry events and metrics for the governance pipeline.
 */

export {
  initTelemetry,
  shutdownTelemetry,
  isTelemetryEnabled,
  emitEvent,
  getLogger,
} from './telemetry';

export {
  emitClassification,
  emitProposalCreated,
  emitProposalTransition,
  emitPatchResult,
} from './events';

export {
  initMetrics,
  recordClassification,
  recordProposal,
  recordTransition,
  recordPatch,
} from './metrics';
