/**
 * File Operations
 *
 * Reads that treat a missing path as `null` or empty, writes that create
 * their parent directory, and cleanup that reports failures.
 */

import { copyFile, mkdir, mkdtemp, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, join } from 'node:path';

export interface FileEntry {
  path: string;
  stats: Stats;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function orWhenMissing<T>(read: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await read();
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return fallback;
    throw error;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Unique directory under `parent`, e.g. `<parent>/abc123def45-Xy12Zq`
 */
export async function makeTempDir(parent: string, prefix: string): Promise<string> {
  await ensureDir(parent);
  return mkdtemp(join(parent, prefix));
}

export async function safeWriteFile(filePath: string, content: string | Uint8Array): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content);
}

/**
 * Readers never see a half-written file: content lands in a sibling
 * and is renamed over the target.
 */
export async function atomicWriteFile(filePath: string, content: string | Uint8Array): Promise<void> {
  const staging = `${filePath}.${process.pid}-${Date.now()}.partial`;
  await safeWriteFile(staging, content);
  try {
    await rename(staging, filePath);
  } catch (error) {
    await rm(staging, { force: true });
    throw error;
  }
}

export function safeReadFile(filePath: string): Promise<string | null> {
  return orWhenMissing<string | null>(() => readFile(filePath, 'utf8'), null);
}

export function safeStat(filePath: string): Promise<Stats | null> {
  return orWhenMissing<Stats | null>(() => stat(filePath), null);
}

/**
 * Regular files directly inside `dirPath`; a missing directory has none
 */
export async function listFiles(dirPath: string): Promise<FileEntry[]> {
  const names = await orWhenMissing<string[]>(() => readdir(dirPath), []);
  const entries: FileEntry[] = [];
  for (const name of names) {
    const path = join(dirPath, name);
    const stats = await safeStat(path);
    if (stats?.isFile()) entries.push({ path, stats });
  }
  return entries;
}

export async function moveFile(source: string, destination: string): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    if (!hasCode(error, 'EXDEV')) throw error;
    // storage and library on different devices
    await copyFile(source, destination);
    await rm(source, { force: true });
  }
}

/**
 * Remove every path, recursively. Failures are collected, not thrown.
 */
export async function removePaths(paths: Iterable<string>): Promise<Array<{ path: string; error: unknown }>> {
  const failures: Array<{ path: string; error: unknown }> = [];
  for (const path of paths) {
    await rm(path, { recursive: true, force: true }).catch((error: unknown) => {
      failures.push({ path, error });
    });
  }
  return failures;
}
