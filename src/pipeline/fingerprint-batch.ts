import PQueue from 'p-queue';
import { defaultConcurrency } from '../config/match-config.js';
import { CancelledError, errorMessage } from '../errors.js';
import log from '../logger.js';
import type { MediaProbe } from '../services/media-probe.js';
import { fingerprint, fingerprintFile } from '../services/fingerprint-service.js';
import type { FingerprintFailure } from '../shared/types/comparison-stats.js';
import type { MediaRecord } from '../shared/types/media-record.js';
import type { ProgressCallback } from '../types.js';
import type { PauseSignal } from './pipeline-control.js';

export interface FileInput {
  path: string;
  bytes?: Buffer;
  mtimeMs?: number;
}

export interface FingerprintBatchOptions {
  concurrency?: number;
  probe?: MediaProbe;
  control?: PauseSignal;
  progress?: ProgressCallback;
}

export interface BatchOutcome {
  records: MediaRecord[];
  failures: FingerprintFailure[];
}

export class FingerprintBatch {
  private readonly queue: PQueue;

  constructor(private readonly options: FingerprintBatchOptions = {}) {
    this.queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? defaultConcurrency()) });
  }

  async run(inputs: readonly FileInput[]): Promise<BatchOutcome> {
    const { control, progress } = this.options;
    const slots: Array<MediaRecord | FingerprintFailure | undefined> = new Array(inputs.length);
    let completed = 0;

    const unsubscribe = control?.onChange(({ paused, cancelled }) => {
      if (cancelled) {
        this.queue.clear();
        this.queue.start();
        return;
      }
      if (paused) {
        this.queue.pause();
      } else {
        this.queue.start();
      }
    });
    if (control?.paused) {
      this.queue.pause();
    }

    try {
      inputs.forEach((input, index) => {
        void this.queue.add(async () => {
          await control?.waitIfPaused();
          if (control?.cancelled) {
            return;
          }
          try {
            slots[index] = await this.fingerprintInput(input);
          } catch (error) {
            const message = errorMessage(error);
            log.error('Fingerprint failed for %s: %s', input.path, message);
            slots[index] = { path: input.path, message };
            progress?.({ type: 'error', path: input.path, message });
          }
          completed += 1;
          progress?.({ type: 'file', path: input.path, completed, total: inputs.length });
        });
      });

      await this.queue.onIdle();
    } finally {
      unsubscribe?.();
    }

    if (control?.cancelled) {
      throw new CancelledError();
    }

    const records: MediaRecord[] = [];
    const failures: FingerprintFailure[] = [];
    for (const slot of slots) {
      if (!slot) {
        continue;
      }
      if (isRecord(slot)) {
        records.push(slot);
      } else {
        failures.push(slot);
      }
    }
    return { records, failures };
  }

  private async fingerprintInput(input: FileInput): Promise<MediaRecord> {
    if (input.bytes) {
      return fingerprint(input.bytes, { path: input.path, mtimeMs: input.mtimeMs }, { probe: this.options.probe });
    }
    return fingerprintFile(input.path, { probe: this.options.probe, mtimeMs: input.mtimeMs });
  }
}

export const fingerprintBatch = (inputs: readonly FileInput[], options: FingerprintBatchOptions = {}): Promise<BatchOutcome> =>
  new FingerprintBatch(options).run(inputs);

const isRecord = (slot: MediaRecord | FingerprintFailure): slot is MediaRecord => 'contentHash' in slot;
