import { Command, CommanderError, Option } from 'commander';

import { createGameAnimationHandler, RenderGameAnimationCommand } from '../index.js';
import { persistArtifact } from '../infrastructure/files/artifact-writer.js';
import { readCss, readPgn } from '../infrastructure/files/text-file-reader.js';
import { loadEnv } from '../shared/config/env.js';
import { AppError } from '../shared/errors/app-error.js';
import { createChildLogger } from '../shared/logger/pino.js';
import { analyzeGif } from '../shared/media/gifToolkit.js';

import { parseCliOptions } from './options.js';

const PROGRAM_NAME = 'pgn2gif';
const VERSION = '0.1.0';

export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

const processOutput: CliOutput = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

export function buildProgram(output: CliOutput = processOutput): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Generate animated GIFs of chess games from PGN files')
    .version(VERSION)
    .requiredOption('--pgn-path <path>', 'path to pgn file to read')
    .requiredOption('--gif-path <path>', 'path to gif file to save')
    .option('--add-initial-position <bool>', 'add initial position to gif', 'true')
    .option('--highlight-last-move <bool>', 'highlight last move on board', 'true')
    .addOption(
      new Option('--orientation <side>', 'orientation of board').choices(['white', 'black']).default('white'),
    )
    .option('--size <pixels>', 'size of board', '400')
    .option('--coordinates <bool>', 'add board coordinates', 'true')
    .option('--css-path <path>', 'path to css file to style board')
    .option('--loop <count>', 'number of loops for gif, 0 means infinite', '0')
    .option('--duration <seconds>', 'duration of each frame (in seconds) in gif, 1.0 unless --fps is given')
    .option('--fps <rate>', 'frames per second of gif, used when --duration is not given')
    .option('--palettesize <colors>', 'number of colors to quantize images to', '64')
    .option('--subrectangles <bool>', 'optimize gif by storing only changed regions', 'true')
    .configureOutput({ writeOut: output.writeOut, writeErr: output.writeErr })
    .exitOverride();
}

/**
 * Runs the CLI against `argv` (arguments only, without the node and script paths) and resolves the exit code.
 */
export async function runCli(argv: readonly string[], output: CliOutput = processOutput): Promise<number> {
  const logger = createChildLogger({ module: 'cli' });
  const program = buildProgram(output);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  let gifPath: string;
  try {
    loadEnv();
    const options = parseCliOptions(program.opts());
    const pgn = await readPgn(options.pgnPath);
    const style = options.cssPath === undefined ? undefined : await readCss(options.cssPath);

    const { artifact } = await createGameAnimationHandler().execute(
      new RenderGameAnimationCommand({
        pgn,
        sequence: options.sequence,
        render: { ...options.render, style },
        animation: options.animation,
      }),
    );

    gifPath = await persistArtifact(artifact, options.gifPath);
  } catch (error) {
    const appError = AppError.fromUnknown(error);
    logger.debug({ error: appError }, 'CLI run failed');
    output.writeErr(`${PROGRAM_NAME}: ${appError.kind}: ${appError.message}\n`);
    return 1;
  }

  // the GIF is already in place; a failed summary only costs the log line
  try {
    const summary = await analyzeGif(gifPath);
    logger.info(
      {
        path: gifPath,
        frames: summary.frameCount,
        width: summary.width,
        height: summary.height,
        durationMs: summary.durationMs,
      },
      'GIF written',
    );
  } catch (error) {
    logger.warn({ path: gifPath, error }, 'GIF written but could not be summarised');
  }

  return 0;
}
