import os from 'node:os';
import { ConfigurationError } from '../errors.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export interface MatchOptions {
  perceptualThreshold: number;
  /** Distances above `perceptualThreshold` up to this value go to manual review. */
  perceptualUncertainThreshold: number;
  livePhotoToleranceMs: number;
  metadataTimeToleranceMs: number;
  videoDurationToleranceMs: number;
}

export interface MatchConfig extends MatchOptions {
  concurrency: number;
  logLevel: LogLevel;
  logDir?: string;
  ffprobePath?: string;
}

export const DEFAULT_MATCH_OPTIONS: Readonly<MatchOptions> = Object.freeze({
  perceptualThreshold: 5,
  perceptualUncertainThreshold: 10,
  livePhotoToleranceMs: 3_000,
  metadataTimeToleranceMs: 60_000,
  videoDurationToleranceMs: 1_000
});

export const defaultConcurrency = (): number => Math.max(1, os.availableParallelism());

export function loadMatchConfig(env: NodeJS.ProcessEnv = process.env): MatchConfig {
  const options = validateMatchOptions({
    perceptualThreshold: readNumber(env.RECONCILE_PERCEPTUAL_THRESHOLD),
    perceptualUncertainThreshold: readNumber(env.RECONCILE_PERCEPTUAL_UNCERTAIN_THRESHOLD),
    livePhotoToleranceMs: readNumber(env.RECONCILE_LIVE_PHOTO_TOLERANCE_MS),
    metadataTimeToleranceMs: readNumber(env.RECONCILE_METADATA_TIME_TOLERANCE_MS),
    videoDurationToleranceMs: readNumber(env.RECONCILE_VIDEO_DURATION_TOLERANCE_MS)
  });

  const concurrencyRaw = readNumber(env.RECONCILE_CONCURRENCY);
  const concurrency = concurrencyRaw === undefined ? defaultConcurrency() : requirePositiveInt(concurrencyRaw, 'RECONCILE_CONCURRENCY');

  const logLevelRaw = env.RECONCILE_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw) ?? 'info';
  const logDir = env.RECONCILE_LOG_DIR?.trim() || undefined;
  const ffprobePath = env.RECONCILE_FFPROBE_PATH?.trim() || undefined;

  return { ...options, concurrency, logLevel, logDir, ffprobePath };
}

export function validateMatchOptions(input: Partial<MatchOptions> = {}): MatchOptions {
  const option = (name: keyof MatchOptions): number =>
    requireNonNegativeInt(input[name] ?? DEFAULT_MATCH_OPTIONS[name], name);
  return {
    perceptualThreshold: option('perceptualThreshold'),
    perceptualUncertainThreshold: option('perceptualUncertainThreshold'),
    livePhotoToleranceMs: option('livePhotoToleranceMs'),
    metadataTimeToleranceMs: option('metadataTimeToleranceMs'),
    videoDurationToleranceMs: option('videoDurationToleranceMs')
  };
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function requireNonNegativeInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer (got ${value})`);
  }
  return value;
}

function requirePositiveInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}
