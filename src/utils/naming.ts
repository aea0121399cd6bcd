import path from 'node:path';
import mime from 'mime-types';
import type { MediaKind } from '../shared/types/media-record.js';
import { detectMagicType } from './magic-bytes.js';

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.heic', '.heif', '.avif', '.png', '.gif', '.webp', '.tif', '.tiff', '.bmp']);
const HEIF_EXTENSIONS = new Set(['.heic', '.heif']);
const JPEG_EXTENSIONS = new Set(['.jpg', '.jpeg']);
const VIDEO_EXTENSIONS = new Set(['.mov', '.mp4', '.m4v', '.avi', '.mkv', '.3gp', '.webm']);

export const LIVE_PHOTO_SUFFIXES = ['_HEVC', '_LIVE', '-LIVE', ' (LIVE)'];

export const normalizeStem = (filePath: string): string => {
  let stem = path.parse(filePath).name.trim().toUpperCase();
  for (const suffix of LIVE_PHOTO_SUFFIXES) {
    if (stem.length > suffix.length && stem.endsWith(suffix)) {
      stem = stem.slice(0, -suffix.length);
      break;
    }
  }
  return stem;
};

export const pairingKey = (filePath: string): string => `${path.dirname(filePath)}/${normalizeStem(filePath)}`;

export const detectMediaKind = (filePath: string, bytes: Uint8Array): MediaKind | null => {
  const ext = path.extname(filePath).toLowerCase();
  if (IMAGE_EXTENSIONS.has(ext)) {
    return 'image';
  }
  if (VIDEO_EXTENSIONS.has(ext)) {
    return 'video';
  }
  switch (detectMagicType(bytes)) {
    case 'jpg':
    case 'png':
    case 'gif':
    case 'webp':
    case 'heic':
    case 'avif':
      return 'image';
    case 'mp4':
    case 'mov':
      return 'video';
    default:
      return null;
  }
};

export const isHeifPath = (filePath: string): boolean => HEIF_EXTENSIONS.has(path.extname(filePath).toLowerCase());

export const isJpegPath = (filePath: string): boolean => JPEG_EXTENSIONS.has(path.extname(filePath).toLowerCase());

export const mimeTypeFor = (filePath: string): string | undefined => {
  const type = mime.lookup(filePath);
  return type === false ? undefined : type;
};
