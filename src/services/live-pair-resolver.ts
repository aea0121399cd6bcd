import { DEFAULT_MATCH_OPTIONS } from '../config/match-config.js';
import type { LogicalUnit, MediaRecord } from '../shared/types/media-record.js';
import { isHeifPath, isJpegPath, pairingKey } from '../utils/naming.js';

export interface ResolveOptions {
  livePhotoToleranceMs?: number;
}

export const createUnit = (
  primary: MediaRecord,
  companion?: MediaRecord,
  renditions: readonly MediaRecord[] = []
): LogicalUnit =>
  Object.freeze({
    key: pairingKey(primary.path),
    primary,
    companion,
    isLivePhoto: companion !== undefined,
    renditions: Object.freeze([...renditions])
  });

export const unitRecords = (unit: LogicalUnit): MediaRecord[] =>
  unit.companion ? [unit.primary, unit.companion] : [unit.primary];

/** Every file behind a unit, superseded renditions included. */
export const unitFiles = (unit: LogicalUnit): MediaRecord[] => [...unitRecords(unit), ...unit.renditions];

/**
 * Partitions one source's records into logical units.
 *
 * Records are grouped by directory and normalized stem. When a group holds exactly one HEIC/HEIF
 * still, its JPEG copies become renditions of that still instead of separate images. A group then
 * holding exactly one image and exactly one video becomes a Live Photo when their capture times are
 * within the tolerance (or either is unknown). Every other record, including all members of an
 * ambiguous group, becomes a singleton. Units come back in order of their earliest member in the
 * input.
 */
export function resolveUnits(records: readonly MediaRecord[], options: ResolveOptions = {}): LogicalUnit[] {
  const tolerance = options.livePhotoToleranceMs ?? DEFAULT_MATCH_OPTIONS.livePhotoToleranceMs;
  const groups = new Map<string, MediaRecord[]>();
  for (const record of records) {
    const key = pairingKey(record.path);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  const unitByRecord = new Map<MediaRecord, LogicalUnit>();
  for (const group of groups.values()) {
    const { owner, renditions } = supersededRenditions(group);
    const members = group.filter((record) => !renditions.includes(record));
    const images = members.filter((record) => record.kind === 'image');
    const videos = members.filter((record) => record.kind === 'video');
    if (images.length === 1 && videos.length === 1 && capturedTogether(images[0], videos[0], tolerance)) {
      const unit = createUnit(images[0], videos[0], renditions);
      for (const record of [images[0], videos[0], ...renditions]) {
        unitByRecord.set(record, unit);
      }
      continue;
    }
    for (const record of members) {
      const unit = createUnit(record, undefined, record === owner ? renditions : []);
      unitByRecord.set(record, unit);
      for (const rendition of unit.renditions) {
        unitByRecord.set(rendition, unit);
      }
    }
  }

  const seen = new Set<LogicalUnit>();
  const units: LogicalUnit[] = [];
  for (const record of records) {
    const unit = unitByRecord.get(record);
    if (unit && !seen.has(unit)) {
      seen.add(unit);
      units.push(unit);
    }
  }
  return units;
}

function supersededRenditions(group: readonly MediaRecord[]): { owner?: MediaRecord; renditions: MediaRecord[] } {
  const heif = group.filter((record) => record.kind === 'image' && isHeifPath(record.path));
  if (heif.length !== 1) {
    return { renditions: [] };
  }
  return { owner: heif[0], renditions: group.filter((record) => record.kind === 'image' && isJpegPath(record.path)) };
}

function capturedTogether(image: MediaRecord, video: MediaRecord, toleranceMs: number): boolean {
  if (image.capturedAt === undefined || video.capturedAt === undefined) {
    return true;
  }
  return Math.abs(image.capturedAt - video.capturedAt) <= toleranceMs;
}
