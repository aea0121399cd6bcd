import { validateMatchOptions } from '../config/match-config.js';
import type { MatchOptions } from '../config/match-config.js';
import type { ComparisonCounts, FingerprintFailure } from '../shared/types/comparison-stats.js';
import type {
  ClassificationRecord,
  LogicalUnit,
  MatchedRecord,
  MediaRecord,
  MissingRecord,
  UncertainRecord
} from '../shared/types/media-record.js';
import { toIsoUtc } from '../utils/date.js';
import { resolveUnits, unitFiles, unitRecords } from './live-pair-resolver.js';
import { classify } from './match-engine.js';

export interface ComparisonContext {
  amazonUnits: readonly LogicalUnit[];
  icloudUnits: readonly LogicalUnit[];
  failures?: readonly FingerprintFailure[];
}

export interface StagingCandidate {
  path: string;
  status: 'missing' | 'uncertain';
  livePhotoKey?: string;
}

export interface SerializedRecord {
  path: string;
  companionPath: string | null;
  isLivePhoto: boolean;
  capturedAt: string | null;
  status: ClassificationRecord['status'];
  strategy: ClassificationRecord['strategy'];
  confidence: number;
  reason: string;
  matchedPath: string | null;
  candidatePaths: string[];
  /** JPEG copies superseded by the HEIC primary; never classified or staged on their own. */
  renditionPaths: string[];
}

export interface SerializedComparison {
  counts: ComparisonCounts;
  records: SerializedRecord[];
  failures: FingerprintFailure[];
}

export class ComparisonResult {
  readonly counts: Readonly<ComparisonCounts>;
  readonly records: readonly ClassificationRecord[];
  readonly failures: readonly FingerprintFailure[];

  constructor(records: readonly ClassificationRecord[], counts: ComparisonCounts, failures: readonly FingerprintFailure[]) {
    this.records = Object.freeze([...records]);
    this.counts = Object.freeze({ ...counts });
    this.failures = Object.freeze([...failures]);
  }

  matched(): MatchedRecord[] {
    return this.records.filter((record): record is MatchedRecord => record.status === 'matched');
  }

  missing(): MissingRecord[] {
    return this.records.filter((record): record is MissingRecord => record.status === 'missing');
  }

  needsReview(): UncertainRecord[] {
    return this.records.filter((record): record is UncertainRecord => record.status === 'uncertain');
  }

  stagingCandidates(): StagingCandidate[] {
    const candidates: StagingCandidate[] = [];
    for (const record of this.records) {
      if (record.status === 'matched') {
        continue;
      }
      for (const file of unitRecords(record.unit)) {
        candidates.push({
          path: file.path,
          status: record.status,
          livePhotoKey: record.unit.isLivePhoto ? record.unit.key : undefined
        });
      }
    }
    return candidates;
  }

  toJSON(): SerializedComparison {
    return {
      counts: { ...this.counts },
      records: this.records.map(serializeRecord),
      failures: [...this.failures]
    };
  }
}

export function buildComparisonResult(
  records: readonly ClassificationRecord[],
  context: ComparisonContext
): ComparisonResult {
  const failures = context.failures ?? [];
  const counts: ComparisonCounts = {
    amazonFiles: countFiles(context.amazonUnits),
    icloudFiles: countFiles(context.icloudUnits),
    amazonUnits: context.amazonUnits.length,
    icloudUnits: context.icloudUnits.length,
    livePhotos: 0,
    renditions: 0,
    matched: 0,
    missing: 0,
    uncertain: 0,
    exact: 0,
    perceptual: 0,
    metadata: 0,
    decodeFailures: 0,
    probeFailures: 0,
    failedFiles: failures.length
  };

  for (const record of records) {
    counts[record.status] += 1;
    if (record.status === 'matched') {
      counts[record.strategy] += 1;
    }
    if (record.unit.isLivePhoto) {
      counts.livePhotos += 1;
    }
    counts.renditions += record.unit.renditions.length;
  }

  for (const file of [...allRecords(context.amazonUnits), ...allRecords(context.icloudUnits)]) {
    for (const warning of file.warnings) {
      if (warning.kind === 'decode-failure') {
        counts.decodeFailures += 1;
      } else {
        counts.probeFailures += 1;
      }
    }
  }

  return new ComparisonResult(records, counts, failures);
}

export interface CompareOptions extends Partial<MatchOptions> {
  failures?: readonly FingerprintFailure[];
}

/**
 * Pairs both record sets into units, classifies the Amazon units and aggregates the outcome.
 */
export function compare(
  amazonRecords: readonly MediaRecord[],
  icloudRecords: readonly MediaRecord[],
  options: CompareOptions = {}
): ComparisonResult {
  const validated = validateMatchOptions(options);
  const resolveOptions = { livePhotoToleranceMs: validated.livePhotoToleranceMs };
  const amazonUnits = resolveUnits(amazonRecords, resolveOptions);
  const icloudUnits = resolveUnits(icloudRecords, resolveOptions);
  const records = classify(amazonUnits, icloudUnits, validated.perceptualThreshold, {
    perceptualUncertainThreshold: validated.perceptualUncertainThreshold,
    metadataTimeToleranceMs: validated.metadataTimeToleranceMs,
    videoDurationToleranceMs: validated.videoDurationToleranceMs
  });
  return buildComparisonResult(records, { amazonUnits, icloudUnits, failures: options.failures });
}

function serializeRecord(record: ClassificationRecord): SerializedRecord {
  return {
    path: record.unit.primary.path,
    companionPath: record.unit.companion?.path ?? null,
    isLivePhoto: record.unit.isLivePhoto,
    capturedAt: toIsoUtc(record.unit.primary.capturedAt),
    status: record.status,
    strategy: record.strategy,
    confidence: record.confidence,
    reason: record.reason,
    matchedPath: record.status === 'matched' ? record.matchedUnit.primary.path : null,
    candidatePaths: record.status === 'uncertain' ? record.candidates.map((unit) => unit.primary.path) : [],
    renditionPaths: record.unit.renditions.map((file) => file.path)
  };
}

function allRecords(units: readonly LogicalUnit[]): MediaRecord[] {
  return units.flatMap(unitFiles);
}

function countFiles(units: readonly LogicalUnit[]): number {
  return units.reduce((sum, unit) => sum + unitFiles(unit).length, 0);
}
