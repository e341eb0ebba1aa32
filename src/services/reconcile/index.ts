export {
  ReconciliationEngine,
  type EngineOptions,
  type OrphanSweepStatus,
  type ReconcilePhase,
  type ReconcileProgress,
  type ReconciliationReport,
  type RunOptions,
  type SnapshotSummary,
} from "./engine.js";
export { evaluate, metadataPatch, diffFields } from "./change-detector.js";
export {
  loadSnapshot,
  resolve,
  type IdentityMatch,
  type ServiceSnapshot,
  type SnapshotStatus,
} from "./identity.js";
export {
  ResultAggregator,
  outcomeLabel,
  type DocumentSummary,
  type OutcomeCounts,
  type OutcomeLabel,
  type ServiceOutcome,
} from "./results.js";
