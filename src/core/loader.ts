/**
 * ROM image loading.
 *
 * Program images are raw little-endian 16-bit words, word 0 at address 0.
 * Everything that can be wrong with an image is reported as a LoadError
 * before any word reaches the decoder.
 */
import { readFileSync, statSync } from 'fs';
import { CODE_FILE_MAX_SIZE } from './types';
import type { Word } from './types';

export class LoadError extends Error {
  source: string;
  constructor(source: string, message: string) {
    super(message);
    this.name = 'LoadError';
    this.source = source;
  }
}

function checkSize(size: number, source: string): void {
  if (size === 0) {
    throw new LoadError(source, `${source} does not contain any code`);
  }
  if (size % 2 === 1) {
    throw new LoadError(source, `${source} is not word-aligned`);
  }
  if (size > CODE_FILE_MAX_SIZE) {
    throw new LoadError(source, `${source} is too big to fit in the MCU memory`);
  }
}

/**
 * Split a byte image into words. `source` names the image in error messages.
 */
export function parseWords(bytes: Uint8Array, source: string): Word[] {
  checkSize(bytes.length, source);
  const words: Word[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    words.push(bytes[i] | (bytes[i + 1] << 8));
  }
  return words;
}

/** Read and split a ROM image from disk */
export function loadBinaryFile(path: string): Word[] {
  let size: number;
  try {
    const stats = statSync(path);
    if (!stats.isFile()) throw new LoadError(path, `${path} is not a file`);
    size = stats.size;
  } catch (err) {
    if (err instanceof LoadError) throw err;
    throw new LoadError(path, `${path} is not a file`);
  }
  checkSize(size, path);

  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch {
    throw new LoadError(path, `I/O error when reading ${path}`);
  }
  if (bytes.length !== size) {
    throw new LoadError(path, `I/O error when reading ${path}`);
  }
  return parseWords(bytes, path);
}
