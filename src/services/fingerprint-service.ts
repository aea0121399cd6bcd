import { UnsupportedMediaError, assertNonEmptyString, errorMessage } from '../errors.js';
import log from '../logger.js';
import type { FileMetadata, FileWarning, MediaKind, MediaRecord, PixelDimensions } from '../shared/types/media-record.js';
import { hashBytes, readHead, statRegularFile, streamHash } from '../utils/files.js';
import { detectMediaKind, mimeTypeFor } from '../utils/naming.js';
import type { MediaProbe, ProbeResult } from './media-probe.js';
import { decodeImage } from './perceptual-hash.js';

export interface FingerprintOptions {
  probe?: MediaProbe;
}

export interface FileFingerprintOptions extends FingerprintOptions {
  /** Overrides the modification time read from disk. */
  mtimeMs?: number;
}

interface SourceDescriptor {
  path: string;
  kind: MediaKind;
  contentHash: string;
  byteSize: number;
  mtimeMs?: number;
  /** What sharp/libheif decode: the bytes themselves or the file path. */
  decodeInput: Buffer | string;
}

/** Fingerprints an in-memory file. */
export async function fingerprint(
  bytes: Buffer,
  file: FileMetadata,
  options: FingerprintOptions = {}
): Promise<MediaRecord> {
  assertNonEmptyString(file.path, 'file.path');
  const kind = detectMediaKind(file.path, bytes);
  if (!kind) {
    throw new UnsupportedMediaError(file.path);
  }
  return buildRecord(
    { path: file.path, kind, contentHash: hashBytes(bytes), byteSize: bytes.length, mtimeMs: file.mtimeMs, decodeInput: bytes },
    options
  );
}

/**
 * Fingerprints a file on disk without loading it whole: the content hash is streamed, the size
 * comes from stat, and decoders and probes read the path.
 */
export async function fingerprintFile(filePath: string, options: FileFingerprintOptions = {}): Promise<MediaRecord> {
  assertNonEmptyString(filePath, 'filePath');
  const stats = await statRegularFile(filePath);
  const kind = detectMediaKind(filePath, await readHead(filePath));
  if (!kind) {
    throw new UnsupportedMediaError(filePath);
  }
  return buildRecord(
    {
      path: filePath,
      kind,
      contentHash: await streamHash(filePath),
      byteSize: stats.size,
      mtimeMs: options.mtimeMs ?? stats.mtimeMs,
      decodeInput: filePath
    },
    options
  );
}

async function buildRecord(source: SourceDescriptor, options: FingerprintOptions): Promise<MediaRecord> {
  const warnings: FileWarning[] = [];
  let perceptualHash: string | undefined;
  let dimensions: PixelDimensions | undefined;

  if (source.kind === 'image') {
    try {
      const decoded = await decodeImage(source.decodeInput);
      dimensions = decoded.dimensions;
      perceptualHash = decoded.perceptualHash;
      if (decoded.hashError) {
        log.warn('Perceptual hash failed for %s: %s', source.path, decoded.hashError);
        warnings.push({ kind: 'decode-failure', message: decoded.hashError });
      }
    } catch (error) {
      const message = errorMessage(error);
      log.warn('Decode failed for %s: %s', source.path, message);
      warnings.push({ kind: 'decode-failure', message });
    }
  }

  let probed: ProbeResult = {};
  if (options.probe) {
    try {
      probed = await options.probe.probe(source.path, source.kind);
    } catch (error) {
      probed = { failures: [errorMessage(error)] };
    }
    for (const message of probed.failures ?? []) {
      log.warn('Metadata probe failed for %s: %s', source.path, message);
      warnings.push({ kind: 'probe-failure', message });
    }
  }

  if (source.kind === 'video') {
    dimensions = probed.dimensions;
  }

  const record: MediaRecord = {
    path: source.path,
    kind: source.kind,
    contentHash: source.contentHash,
    perceptualHash,
    capturedAt: probed.capturedAt ?? finiteOrUndefined(source.mtimeMs),
    dimensions: dimensions ? Object.freeze({ ...dimensions }) : undefined,
    durationMs: source.kind === 'video' ? probed.durationMs : undefined,
    byteSize: source.byteSize,
    mimeType: mimeTypeFor(source.path),
    warnings: Object.freeze(warnings)
  };
  return Object.freeze(record);
}

const finiteOrUndefined = (value: number | undefined): number | undefined =>
  value !== undefined && Number.isFinite(value) ? value : undefined;
