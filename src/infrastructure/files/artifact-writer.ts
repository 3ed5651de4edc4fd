import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { AnimationArtifact } from '../../domain/game-animation/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';

const logger = createChildLogger({ module: 'ArtifactWriter' });

/**
 * Writes the artifact to `destination` and releases it, whether or not the write succeeds.
 * Data goes to a staging file first so the destination never holds a partial GIF.
 */
export async function persistArtifact(artifact: AnimationArtifact, destination: string): Promise<string> {
  const target = path.resolve(destination);
  const staging = `${target}.${process.pid}.partial`;

  try {
    const contents = await artifact.read();
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(staging, contents);
    await fs.rename(staging, target);

    logger.debug({ path: target, bytes: contents.byteLength }, 'Animation persisted');
    return target;
  } catch (error) {
    await fs.rm(staging, { force: true });
    const reason = error instanceof Error ? error.message : String(error);
    throw AppError.io('io.write-failed', `Unable to write ${target}: ${reason}`, error, { path: target });
  } finally {
    await artifact.release();
  }
}
