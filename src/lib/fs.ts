/**
 * Output file helpers. Whole-file writes land through a rename so an
 * interrupted run never leaves a truncated transcript behind.
 */

import { appendFile, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

let tempCounter = 0;

function tempPathFor(path: string): string {
  tempCounter++;
  return join(dirname(path), `.${basename(path)}.${process.pid}.${tempCounter}.tmp`);
}

/**
 * Replace a file's content in one step
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  const temp = tempPathFor(path);
  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

export async function appendTextFile(path: string, content: string): Promise<void> {
  await appendFile(path, content, 'utf-8');
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
