import { promises as fs } from 'node:fs';

import { AppError } from '../../shared/errors/app-error.js';

export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw AppError.io('io.read-failed', `Unable to read ${filePath}: ${reason}`, error, { path: filePath });
  }
}

export const readPgn = readTextFile;
export const readCss = readTextFile;
