import crypto from 'node:crypto';
import fs from 'fs-extra';

const HASH_ALGORITHM = 'sha256';

export interface FileStats {
  size: number;
  mtimeMs: number;
}

export const hashBytes = (bytes: Uint8Array): string =>
  crypto.createHash(HASH_ALGORITHM).update(bytes).digest('hex');

export const streamHash = async (filePath: string): Promise<string> => {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(HASH_ALGORITHM);
    const stream = fs.createReadStream(filePath);
    stream.on('error', reject);
    hash.once('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
};

export const statRegularFile = async (filePath: string): Promise<FileStats> => {
  const stats = await fs.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Not a regular file: ${filePath}`);
  }
  return { size: stats.size, mtimeMs: stats.mtimeMs };
};

export const readHead = async (filePath: string, length: number = 64): Promise<Buffer> => {
  const fd = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fs.read(fd, buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fs.close(fd);
  }
};
