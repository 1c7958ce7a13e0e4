import { createWriteStream, promises as fs } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import type { Readable } from 'node:stream';
import crypto from 'node:crypto';
import os from 'node:os';
import path from 'node:path';

/**
 * Writes `source` to a fresh file, hands its path to `fn`, and removes the file
 * afterwards whether `fn` resolved or threw.
 */
export async function withTempFile<T>(
  source: Readable,
  options: { dir?: string; suffix: string },
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const dir = options.dir ?? os.tmpdir();
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    // pipeline never got the stream, so release the connection behind it here.
    source.destroy();
    throw err;
  }
  const filePath = path.join(dir, `${crypto.randomUUID()}${options.suffix}`);

  try {
    await pipeline(source, createWriteStream(filePath));
    return await fn(filePath);
  } finally {
    await fs.rm(filePath, { force: true });
  }
}
