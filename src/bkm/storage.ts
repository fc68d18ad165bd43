import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { BookmarkViewConfig } from '../config.js';
import { BKM_FILE_SUFFIX } from './constants.js';

/**
 * Filesystem helpers for sidecar storage.
 *
 * Responsibilities:
 * - Map a document path to its `.bkm` sidecar.
 * - Ensure resolved paths stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface BookmarkFileIo {
  readFile(absolutePath: string): Promise<string>;
  writeFile(absolutePath: string, text: string): Promise<void>;
}

export interface ReadSidecarResult {
  absolutePath: string;
  text: string;
  etag: string;
}

/**
 * Hex-encoded SHA-256 of the file contents, used as an etag.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * This is a lexical check only; symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Sidecar path for a document: the document path plus `.bkm`.
 */
export function sidecarPathFor(documentPath: string): string {
  return `${documentPath}${BKM_FILE_SUFFIX}`;
}

/**
 * Resolve the sidecar of `documentPath` (relative to `rootDir`) and check that
 * it stays inside `rootDir`.
 */
export function resolveSidecarPath(config: BookmarkViewConfig, documentPath: string): string {
  if (!documentPath.trim()) throw new Error('Document path must be non-empty');
  const rootDir = resolve(config.rootDir);
  const absolutePath = sidecarPathFor(resolve(rootDir, documentPath));
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}

export const nodeFileIo: BookmarkFileIo = {
  readFile: (absolutePath) => readFile(absolutePath, 'utf8'),
  writeFile: writeFileAtomic,
};

export async function readSidecarFile(
  config: BookmarkViewConfig,
  documentPath: string,
  io: BookmarkFileIo = nodeFileIo
): Promise<ReadSidecarResult> {
  const absolutePath = resolveSidecarPath(config, documentPath);
  const text = await io.readFile(absolutePath);
  return { absolutePath, text, etag: sha256Hex(text) };
}
