import type { ComparisonCounts } from './shared/types/comparison-stats.js';

export type ReconcilePhase = 'fingerprint-amazon' | 'fingerprint-icloud' | 'pair' | 'classify' | 'complete';

export type ProgressCallback = (event: {
  type: 'phase' | 'file' | 'log' | 'error' | 'stats';
  phase?: ReconcilePhase;
  path?: string;
  completed?: number;
  total?: number;
  message?: string;
  error?: Error;
  stats?: ComparisonCounts;
}) => void;
