export { DEFAULT_MATCH_OPTIONS, defaultConcurrency, loadMatchConfig, validateMatchOptions } from './config/match-config.js';
export type { LogLevel, MatchConfig, MatchOptions } from './config/match-config.js';
export { CancelledError, ConfigurationError, InvariantError, UnsupportedMediaError } from './errors.js';
export { configureLogger } from './logger.js';
export { FingerprintBatch, fingerprintBatch } from './pipeline/fingerprint-batch.js';
export type { BatchOutcome, FileInput, FingerprintBatchOptions } from './pipeline/fingerprint-batch.js';
export { PipelineControl } from './pipeline/pipeline-control.js';
export type { PauseSignal } from './pipeline/pipeline-control.js';
export { ReconcileRunner } from './pipeline/reconcile-runner.js';
export type { ReconcileRequest, ReconcileRunnerOptions } from './pipeline/reconcile-runner.js';
export { ComparisonResult, buildComparisonResult, compare } from './services/comparison-result.js';
export type {
  CompareOptions,
  ComparisonContext,
  SerializedComparison,
  SerializedRecord,
  StagingCandidate
} from './services/comparison-result.js';
export { fingerprint, fingerprintFile } from './services/fingerprint-service.js';
export type { FileFingerprintOptions, FingerprintOptions } from './services/fingerprint-service.js';
export { createUnit, resolveUnits, unitFiles, unitRecords } from './services/live-pair-resolver.js';
export type { ResolveOptions } from './services/live-pair-resolver.js';
export {
  DEFAULT_TIERS,
  buildExactIndex,
  classify,
  classifyUnit,
  exactTier,
  metadataAgreement,
  metadataTier,
  perceptualReviewTier,
  perceptualTier
} from './services/match-engine.js';
export type { ClassifyOptions, MatchTier, TierContext, TierOutcome } from './services/match-engine.js';
export { ExifToolMediaProbe } from './services/media-probe.js';
export type { ExifToolProbeOptions, MediaProbe, ProbeResult } from './services/media-probe.js';
export {
  PERCEPTUAL_HASH_BITS,
  computePerceptualHash,
  decodeImage,
  hammingDistance,
  hashFromGreyPixels
} from './services/perceptual-hash.js';
export type { DecodedImage } from './services/perceptual-hash.js';
export type { ComparisonCounts, FingerprintFailure } from './shared/types/comparison-stats.js';
export type * from './shared/types/media-record.js';
export type { ProgressCallback, ReconcilePhase } from './types.js';
