import { ExifDateTime, ExifTool } from 'exiftool-vendored';
import ffprobe from 'ffprobe-static';
import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import { errorMessage } from '../errors.js';
import log from '../logger.js';
import type { MediaKind, PixelDimensions } from '../shared/types/media-record.js';
import { parseCaptureTimestamp } from '../utils/date.js';

export interface ProbeResult {
  capturedAt?: number;
  dimensions?: PixelDimensions;
  durationMs?: number;
  /** Partial failures; whatever else was read is still returned. */
  failures?: string[];
}

export interface MediaProbe {
  probe(filePath: string, kind: MediaKind): Promise<ProbeResult>;
  dispose?(): Promise<void>;
}

export interface ExifToolProbeOptions {
  ffprobePath?: string;
}

const CAPTURE_TAGS = ['DateTimeOriginal', 'SubSecDateTimeOriginal', 'CreateDate', 'MediaCreateDate', 'TrackCreateDate'] as const;

export class ExifToolMediaProbe implements MediaProbe {
  private exif = new ExifTool();

  constructor(options: ExifToolProbeOptions = {}) {
    const ffprobePath = options.ffprobePath ?? ffprobe.path;
    if (ffprobePath) {
      ffmpeg.setFfprobePath(ffprobePath);
    }
  }

  async probe(filePath: string, kind: MediaKind): Promise<ProbeResult> {
    const failures: string[] = [];
    let capturedAt: number | undefined;
    try {
      capturedAt = await this.readCaptureTime(filePath);
    } catch (error) {
      failures.push(`exiftool: ${errorMessage(error)}`);
    }
    if (kind === 'image') {
      return { capturedAt, failures };
    }

    try {
      const stream = await this.probeVideoStream(filePath);
      return { capturedAt, ...stream, failures };
    } catch (error) {
      failures.push(`ffprobe: ${errorMessage(error)}`);
      log.debug('ffprobe failed for %s; keeping capture time only', filePath);
      return { capturedAt, failures };
    }
  }

  async dispose(): Promise<void> {
    await this.exif.end();
    this.exif = new ExifTool();
  }

  private async readCaptureTime(filePath: string): Promise<number | undefined> {
    const tags = new Map<string, unknown>(Object.entries(await this.exif.read(filePath)));
    for (const tag of CAPTURE_TAGS) {
      const millis = toMillis(tags.get(tag));
      if (millis !== undefined) {
        return millis;
      }
    }
    return undefined;
  }

  private async probeVideoStream(filePath: string): Promise<{ dimensions: PixelDimensions; durationMs?: number }> {
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (error: Error | null, result: FfprobeData) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(result);
      });
    });
    const stream = data.streams?.find((candidate) => candidate.codec_type === 'video');
    if (!stream?.width || !stream.height) {
      throw new Error('Video stream missing from payload.');
    }
    const seconds = Number(stream.duration ?? data.format?.duration);
    return {
      dimensions: { width: stream.width, height: stream.height },
      durationMs: Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds * 1000) : undefined
    };
  }
}

const toMillis = (value: unknown): number | undefined => {
  if (value instanceof ExifDateTime) {
    const millis = value.toDate().getTime();
    return Number.isFinite(millis) ? millis : undefined;
  }
  if (typeof value === 'string') {
    return parseCaptureTimestamp(value);
  }
  return undefined;
};
