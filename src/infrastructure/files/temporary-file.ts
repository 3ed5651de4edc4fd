import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { loadEnv } from '../../shared/config/env.js';

/**
 * A file inside its own private temporary directory. `release` removes both.
 */
export class TemporaryFile {
  private released = false;

  private constructor(
    private readonly directory: string,
    public readonly path: string,
  ) {}

  public static async create(fileName: string, root = loadEnv().PGN2GIF_TMPDIR ?? os.tmpdir()): Promise<TemporaryFile> {
    const directory = await fs.mkdtemp(path.join(root, 'pgn2gif-'));
    return new TemporaryFile(directory, path.join(directory, fileName));
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public async read(): Promise<Buffer> {
    if (this.released) {
      throw new Error(`Temporary file ${this.path} has already been released`);
    }

    return fs.readFile(this.path);
  }

  public async release(): Promise<void> {
    if (this.released) {
      return;
    }

    this.released = true;
    await fs.rm(this.directory, { recursive: true, force: true });
  }
}
