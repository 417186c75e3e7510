import { createReadStream, promises as fs } from 'node:fs';
import type { Readable } from 'node:stream';

import { err, ok, type Result } from 'neverthrow';

export class InputFileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputFileNotFoundError';
  }
}

/**
 * Open a file for streaming after checking that it exists and is a regular file.
 */
export async function openInputFile(path: string): Promise<Result<Readable, Error>> {
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) {
      return err(new Error(`Input path is not a file: ${path}`));
    }
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return err(new InputFileNotFoundError(path));
    }
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  return ok(createReadStream(path));
}
