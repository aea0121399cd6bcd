export interface ComparisonCounts {
  amazonFiles: number;
  icloudFiles: number;
  amazonUnits: number;
  icloudUnits: number;
  livePhotos: number;
  renditions: number;
  matched: number;
  missing: number;
  uncertain: number;
  exact: number;
  perceptual: number;
  metadata: number;
  decodeFailures: number;
  probeFailures: number;
  failedFiles: number;
}

export interface FingerprintFailure {
  path: string;
  message: string;
}
