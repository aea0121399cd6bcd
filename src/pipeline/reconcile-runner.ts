import { loadMatchConfig } from '../config/match-config.js';
import type { MatchConfig } from '../config/match-config.js';
import log, { configureLogger } from '../logger.js';
import { ComparisonResult, buildComparisonResult } from '../services/comparison-result.js';
import { resolveUnits } from '../services/live-pair-resolver.js';
import { classify } from '../services/match-engine.js';
import { ExifToolMediaProbe } from '../services/media-probe.js';
import type { MediaProbe } from '../services/media-probe.js';
import type { ProgressCallback } from '../types.js';
import { FingerprintBatch } from './fingerprint-batch.js';
import type { FileInput } from './fingerprint-batch.js';
import { PipelineControl } from './pipeline-control.js';

export interface ReconcileRequest {
  amazon: readonly FileInput[];
  icloud: readonly FileInput[];
}

export interface ReconcileRunnerOptions {
  config?: MatchConfig;
  /** Shared probe owned by the caller; the runner never disposes it. */
  probe?: MediaProbe;
  /** Builds a probe per run, disposed when the run ends. Ignored when `probe` is set. */
  createProbe?: () => MediaProbe;
}

export class ReconcileRunner {
  private readonly config: MatchConfig;
  private readonly sharedProbe?: MediaProbe;
  private readonly createProbe: () => MediaProbe;
  private readonly control = new PipelineControl();
  private isRunning = false;

  constructor(options: ReconcileRunnerOptions = {}) {
    this.config = options.config ?? loadMatchConfig();
    this.sharedProbe = options.probe;
    this.createProbe = options.createProbe ?? (() => new ExifToolMediaProbe({ ffprobePath: this.config.ffprobePath }));
    configureLogger({ level: this.config.logLevel, logDir: this.config.logDir });
  }

  async run(request: ReconcileRequest, progress: ProgressCallback = () => undefined): Promise<ComparisonResult> {
    if (this.isRunning) {
      throw new Error('Reconcile run is already in progress.');
    }
    const ownedProbe = this.sharedProbe ? undefined : this.createProbe();
    this.isRunning = true;
    this.control.reset();
    const startedAt = Date.now();

    try {
      const batch = new FingerprintBatch({
        concurrency: this.config.concurrency,
        probe: this.sharedProbe ?? ownedProbe,
        control: this.control,
        progress
      });

      progress({ type: 'phase', phase: 'fingerprint-amazon' });
      const amazon = await batch.run(request.amazon);
      progress({ type: 'phase', phase: 'fingerprint-icloud' });
      const icloud = await batch.run(request.icloud);

      progress({ type: 'phase', phase: 'pair' });
      const resolveOptions = { livePhotoToleranceMs: this.config.livePhotoToleranceMs };
      const amazonUnits = resolveUnits(amazon.records, resolveOptions);
      const icloudUnits = resolveUnits(icloud.records, resolveOptions);

      progress({ type: 'phase', phase: 'classify' });
      const records = classify(amazonUnits, icloudUnits, this.config.perceptualThreshold, {
        perceptualUncertainThreshold: this.config.perceptualUncertainThreshold,
        metadataTimeToleranceMs: this.config.metadataTimeToleranceMs,
        videoDurationToleranceMs: this.config.videoDurationToleranceMs
      });
      const result = buildComparisonResult(records, {
        amazonUnits,
        icloudUnits,
        failures: [...amazon.failures, ...icloud.failures]
      });
      progress({ type: 'stats', stats: { ...result.counts } });

      log.info(
        'Reconciled %d Amazon units against %d iCloud units in %dms: %d matched, %d missing, %d uncertain',
        result.counts.amazonUnits,
        result.counts.icloudUnits,
        Date.now() - startedAt,
        result.counts.matched,
        result.counts.missing,
        result.counts.uncertain
      );
      progress({ type: 'phase', phase: 'complete' });
      return result;
    } finally {
      await ownedProbe?.dispose?.();
      this.isRunning = false;
    }
  }

  getStatus(): { running: boolean; paused: boolean; cancelled: boolean } {
    return { running: this.isRunning, paused: this.control.paused, cancelled: this.control.cancelled };
  }

  pause(): void {
    if (!this.isRunning) {
      return;
    }
    this.control.pause();
  }

  resume(): void {
    this.control.resume();
  }

  cancel(): void {
    if (!this.isRunning) {
      return;
    }
    this.control.cancel();
  }
}
