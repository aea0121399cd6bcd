import { DateTime } from 'luxon';

const EXIF_FORMATS = ['yyyy:MM:dd HH:mm:ss', 'yyyy:MM:dd HH:mm:ssZZ', 'yyyy:MM:dd HH:mm:ss.SSS'];

export const parseCaptureTimestamp = (raw: string): number | undefined => {
  const text = raw.trim();
  if (!text || text.startsWith('0000:00:00')) {
    return undefined;
  }
  for (const format of EXIF_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone: 'utc', setZone: true });
    if (parsed.isValid) {
      return parsed.toMillis();
    }
  }
  const iso = DateTime.fromISO(text.replace(' UTC', 'Z').replace(' ', 'T'), { zone: 'utc', setZone: true });
  return iso.isValid ? iso.toMillis() : undefined;
};

export const toIsoUtc = (millis: number | undefined): string | null => {
  if (millis === undefined) {
    return null;
  }
  const dt = DateTime.fromMillis(millis, { zone: 'utc' });
  return dt.isValid ? dt.toISO() : null;
};
