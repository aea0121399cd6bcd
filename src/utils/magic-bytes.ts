export type MagicType = 'jpg' | 'png' | 'gif' | 'webp' | 'heic' | 'avif' | 'mp4' | 'mov' | 'unknown';

const MAGIC_MAP: Array<{ type: MagicType; bytes: number[]; offset?: number }> = [
  { type: 'jpg', bytes: [0xff, 0xd8, 0xff] },
  { type: 'png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { type: 'gif', bytes: [0x47, 0x49, 0x46, 0x38] },
  { type: 'webp', bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
  { type: 'mov', bytes: [0x6d, 0x6f, 0x6f, 0x76], offset: 4 }
];

const FTYP = [0x66, 0x74, 0x79, 0x70];
const HEIF_BRANDS = new Set(['heic', 'heix', 'hevc', 'hevx', 'heim', 'heis', 'mif1', 'msf1']);
const AVIF_BRANDS = new Set(['avif', 'avis']);

const matchesAt = (buffer: Uint8Array, bytes: number[], offset: number): boolean => {
  const sample = buffer.subarray(offset, offset + bytes.length);
  if (sample.length < bytes.length) {
    return false;
  }
  return bytes.every((value, idx) => sample[idx] === value);
};

export const detectMagicType = (buffer: Uint8Array): MagicType => {
  if (matchesAt(buffer, FTYP, 4)) {
    const brand = Buffer.from(buffer.subarray(8, 12)).toString('latin1');
    if (HEIF_BRANDS.has(brand)) {
      return 'heic';
    }
    if (AVIF_BRANDS.has(brand)) {
      return 'avif';
    }
    return brand === 'qt  ' ? 'mov' : 'mp4';
  }
  for (const sig of MAGIC_MAP) {
    if (matchesAt(buffer, sig.bytes, sig.offset ?? 0)) {
      return sig.type;
    }
  }
  return 'unknown';
};
