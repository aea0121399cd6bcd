export type MediaKind = 'image' | 'video';

export type FileWarningKind = 'decode-failure' | 'probe-failure';

export interface FileWarning {
  kind: FileWarningKind;
  message: string;
}

export interface PixelDimensions {
  width: number;
  height: number;
}

export interface FileMetadata {
  path: string;
  mtimeMs?: number;
}

export interface MediaRecord {
  readonly path: string;
  readonly kind: MediaKind;
  readonly contentHash: string;
  readonly perceptualHash?: string;
  readonly capturedAt?: number;
  readonly dimensions?: Readonly<PixelDimensions>;
  readonly durationMs?: number;
  readonly byteSize: number;
  readonly mimeType?: string;
  readonly warnings: readonly FileWarning[];
}

export interface LogicalUnit {
  readonly key: string;
  readonly primary: MediaRecord;
  readonly companion?: MediaRecord;
  readonly isLivePhoto: boolean;
  /** JPEG copies of a HEIC primary; superseded by it and never classified on their own. */
  readonly renditions: readonly MediaRecord[];
}

export type MatchStatus = 'matched' | 'missing' | 'uncertain';

export type MatchStrategy = 'exact' | 'perceptual' | 'metadata';

export interface MatchedRecord {
  readonly status: 'matched';
  readonly unit: LogicalUnit;
  readonly matchedUnit: LogicalUnit;
  readonly strategy: MatchStrategy;
  readonly confidence: number;
  readonly reason: string;
  readonly distance?: number;
}

export interface UncertainRecord {
  readonly status: 'uncertain';
  readonly unit: LogicalUnit;
  readonly strategy: 'none';
  readonly candidates: readonly LogicalUnit[];
  readonly confidence: number;
  readonly reason: string;
}

export interface MissingRecord {
  readonly status: 'missing';
  readonly unit: LogicalUnit;
  readonly strategy: 'none';
  readonly confidence: 0;
  readonly reason: string;
}

export type ClassificationRecord = MatchedRecord | UncertainRecord | MissingRecord;
