import { DEFAULT_MATCH_OPTIONS, validateMatchOptions } from '../config/match-config.js';
import { InvariantError } from '../errors.js';
import type { MatchOptions } from '../config/match-config.js';
import type {
  ClassificationRecord,
  LogicalUnit,
  MatchStrategy,
  MatchedRecord,
  MediaRecord,
  MissingRecord,
  UncertainRecord
} from '../shared/types/media-record.js';
import { unitFiles } from './live-pair-resolver.js';
import { hammingDistance, maxHashDistance } from './perceptual-hash.js';

export interface TierContext {
  perceptualThreshold: number;
  perceptualUncertainThreshold: number;
  metadataTimeToleranceMs: number;
  videoDurationToleranceMs: number;
  exactIndex: ReadonlyMap<string, LogicalUnit>;
}

export type TierOutcome =
  | { kind: 'match'; strategy: MatchStrategy; unit: LogicalUnit; confidence: number; reason: string; distance?: number }
  | { kind: 'ambiguous'; candidates: LogicalUnit[]; confidence: number; reason: string };

export type MatchTier = (
  unit: LogicalUnit,
  icloudUnits: readonly LogicalUnit[],
  context: TierContext
) => TierOutcome | null;

const metadataConfidence = (score: number): number => (score >= 3 ? 0.9 : 0.6);

// Only the primary decides; a companion hit alone never covers a still.
export const exactTier: MatchTier = (unit, _icloudUnits, context) => {
  const hash = unit.primary.contentHash;
  const match = context.exactIndex.get(hash);
  if (!match) {
    return null;
  }
  return {
    kind: 'match',
    strategy: 'exact',
    unit: match,
    confidence: 1,
    reason: `content hash ${hash.slice(0, 12)} matches ${match.primary.path}`
  };
};

export const perceptualTier: MatchTier = (unit, icloudUnits, context) => {
  const hash = unit.primary.perceptualHash;
  if (!hash) {
    return null;
  }
  const best = closestByPerceptualHash(hash, icloudUnits, 0, context.perceptualThreshold);
  if (!best) {
    return null;
  }
  return {
    kind: 'match',
    strategy: 'perceptual',
    unit: best.units[0],
    confidence: clamp01(1 - best.distance / maxHashDistance(hash)),
    distance: best.distance,
    reason: `perceptual hash distance ${best.distance} <= ${context.perceptualThreshold}`
  };
};

/** Near misses just above the match threshold are sent to review instead of reported missing. */
export const perceptualReviewTier: MatchTier = (unit, icloudUnits, context) => {
  const hash = unit.primary.perceptualHash;
  const { perceptualThreshold: threshold, perceptualUncertainThreshold: ceiling } = context;
  if (!hash || ceiling <= threshold) {
    return null;
  }
  const best = closestByPerceptualHash(hash, icloudUnits, threshold + 1, ceiling);
  if (!best) {
    return null;
  }
  return {
    kind: 'ambiguous',
    candidates: best.units,
    confidence: clamp01(0.5 - (best.distance - threshold) / (maxHashDistance(hash) - threshold)),
    reason: `perceptual hash distance ${best.distance} is above ${threshold} but within ${ceiling}`
  };
};

export const metadataTier: MatchTier = (unit, icloudUnits, context) => {
  let bestScore = 0;
  let bestCandidates: LogicalUnit[] = [];
  for (const candidate of icloudUnits) {
    if (candidate.primary.kind !== unit.primary.kind) {
      continue;
    }
    const score = metadataAgreement(
      unit.primary,
      candidate.primary,
      context.metadataTimeToleranceMs,
      context.videoDurationToleranceMs
    );
    if (score < 2 || score < bestScore) {
      continue;
    }
    if (score > bestScore) {
      bestScore = score;
      bestCandidates = [candidate];
    } else {
      bestCandidates.push(candidate);
    }
  }

  if (bestCandidates.length === 0) {
    return null;
  }
  const confidence = metadataConfidence(bestScore);
  if (bestCandidates.length > 1) {
    return {
      kind: 'ambiguous',
      candidates: bestCandidates,
      confidence,
      reason: `${bestCandidates.length} candidates agree on ${bestScore} metadata fields`
    };
  }
  return {
    kind: 'match',
    strategy: 'metadata',
    unit: bestCandidates[0],
    confidence,
    reason: `metadata agrees on ${bestScore} fields`
  };
};

export const DEFAULT_TIERS: readonly MatchTier[] = [exactTier, perceptualTier, metadataTier, perceptualReviewTier];

/**
 * Number of metadata fields (capture time, dimensions, video duration, byte size) present on both
 * records and agreeing. Returns 0 when any field present on both sides disagrees.
 */
export function metadataAgreement(
  a: MediaRecord,
  b: MediaRecord,
  timeToleranceMs: number,
  durationToleranceMs: number = DEFAULT_MATCH_OPTIONS.videoDurationToleranceMs
): number {
  let agreeing = 0;

  if (a.capturedAt !== undefined && b.capturedAt !== undefined) {
    if (Math.abs(a.capturedAt - b.capturedAt) > timeToleranceMs) {
      return 0;
    }
    agreeing += 1;
  }

  if (a.dimensions && b.dimensions) {
    if (a.dimensions.width !== b.dimensions.width || a.dimensions.height !== b.dimensions.height) {
      return 0;
    }
    agreeing += 1;
  }

  if (a.durationMs !== undefined && b.durationMs !== undefined) {
    if (Math.abs(a.durationMs - b.durationMs) > durationToleranceMs) {
      return 0;
    }
    agreeing += 1;
  }

  if (a.byteSize !== b.byteSize) {
    return 0;
  }
  return agreeing + 1;
}

export function buildExactIndex(units: readonly LogicalUnit[]): Map<string, LogicalUnit> {
  const index = new Map<string, LogicalUnit>();
  for (const unit of units) {
    for (const record of unitFiles(unit)) {
      if (!index.has(record.contentHash)) {
        index.set(record.contentHash, unit);
      }
    }
  }
  return index;
}

export function classifyUnit(
  unit: LogicalUnit,
  icloudUnits: readonly LogicalUnit[],
  context: TierContext,
  tiers: readonly MatchTier[] = DEFAULT_TIERS
): ClassificationRecord {
  for (const tier of tiers) {
    const outcome = tier(unit, icloudUnits, context);
    if (!outcome) {
      continue;
    }
    if (outcome.kind === 'ambiguous') {
      const uncertain: UncertainRecord = {
        status: 'uncertain',
        unit,
        strategy: 'none',
        candidates: Object.freeze(outcome.candidates),
        confidence: outcome.confidence,
        reason: outcome.reason
      };
      return Object.freeze(uncertain);
    }
    const companion = unit.companion;
    if (companion && !outcome.unit.companion && !context.exactIndex.has(companion.contentHash)) {
      return missingRecord(
        unit,
        `still matched by ${outcome.strategy} but motion companion ${companion.path} is not in iCloud library`
      );
    }
    const matched: MatchedRecord = {
      status: 'matched',
      unit,
      matchedUnit: outcome.unit,
      strategy: outcome.strategy,
      confidence: outcome.confidence,
      reason: outcome.reason,
      distance: outcome.distance
    };
    return Object.freeze(matched);
  }
  return missingRecord(unit, 'no exact, perceptual or metadata match in iCloud library');
}

function missingRecord(unit: LogicalUnit, reason: string): MissingRecord {
  const missing: MissingRecord = { status: 'missing', unit, strategy: 'none', confidence: 0, reason };
  return Object.freeze(missing);
}

export interface ClassifyOptions extends Partial<Omit<MatchOptions, 'perceptualThreshold' | 'livePhotoToleranceMs'>> {
  tiers?: readonly MatchTier[];
}

/**
 * Classifies every Amazon unit against the iCloud set, in Amazon input order.
 * Tiers run in priority order and the first one producing an outcome decides the record.
 */
export function classify(
  amazonUnits: readonly LogicalUnit[],
  icloudUnits: readonly LogicalUnit[],
  perceptualThreshold?: number,
  options: ClassifyOptions = {}
): ClassificationRecord[] {
  const { tiers = DEFAULT_TIERS, ...tolerances } = options;
  const validated = validateMatchOptions({ ...tolerances, perceptualThreshold });
  for (const unit of [...amazonUnits, ...icloudUnits]) {
    assertUnit(unit);
  }

  const context: TierContext = {
    perceptualThreshold: validated.perceptualThreshold,
    perceptualUncertainThreshold: validated.perceptualUncertainThreshold,
    metadataTimeToleranceMs: validated.metadataTimeToleranceMs,
    videoDurationToleranceMs: validated.videoDurationToleranceMs,
    exactIndex: buildExactIndex(icloudUnits)
  };
  return amazonUnits.map((unit) => classifyUnit(unit, icloudUnits, context, tiers));
}

function assertUnit(unit: LogicalUnit): void {
  if (!unit || !unit.primary || typeof unit.primary.contentHash !== 'string') {
    throw new InvariantError('Logical unit has no primary record');
  }
}

function closestByPerceptualHash(
  hash: string,
  icloudUnits: readonly LogicalUnit[],
  minDistance: number,
  maxDistance: number
): { units: LogicalUnit[]; distance: number } | null {
  let best: { units: LogicalUnit[]; distance: number } | null = null;
  for (const candidate of icloudUnits) {
    const candidateHash = candidate.primary.perceptualHash;
    if (!candidateHash) {
      continue;
    }
    const distance = hammingDistance(hash, candidateHash);
    if (distance === null || distance < minDistance || distance > maxDistance) {
      continue;
    }
    if (!best || distance < best.distance) {
      best = { units: [candidate], distance };
    } else if (distance === best.distance) {
      best.units.push(candidate);
    }
  }
  return best;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
