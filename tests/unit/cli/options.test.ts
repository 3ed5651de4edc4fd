import { describe, expect, it } from 'vitest';

import { buildProgram } from '@/cli/program.js';
import { parseBooleanToken, parseCliOptions } from '@/cli/options.js';

import { captureError } from '../../helpers/errors.js';

const silent = { writeOut: () => undefined, writeErr: () => undefined };

function optionsFor(argv: string[]) {
  const program = buildProgram(silent);
  program.parse(['--pgn-path', 'game.pgn', '--gif-path', 'game.gif', ...argv], { from: 'user' });
  return parseCliOptions(program.opts());
}

describe('parseBooleanToken', () => {
  it('accepts the usual spellings in any case', () => {
    for (const token of ['1', 't', 'true', 'TRUE', 'True']) {
      expect(parseBooleanToken(token)).toBe(true);
    }
    for (const token of ['0', 'f', 'false', 'FALSE', 'F']) {
      expect(parseBooleanToken(token)).toBe(false);
    }
  });

  it('returns undefined for anything else', () => {
    expect(parseBooleanToken('yes')).toBeUndefined();
    expect(parseBooleanToken('')).toBeUndefined();
    expect(parseBooleanToken(' true ')).toBeUndefined();
  });
});

describe('CLI options', () => {
  it('applies defaults', () => {
    expect(optionsFor([])).toEqual({
      pgnPath: 'game.pgn',
      gifPath: 'game.gif',
      cssPath: undefined,
      sequence: { includeInitialPosition: true, highlightLastMove: true },
      render: { orientation: 'white', size: 400, coordinates: true },
      animation: { loop: 0, duration: 1, fps: undefined, paletteSize: 64, subrectangles: true },
    });
  });

  it('uses the frame rate when no duration is given', () => {
    expect(optionsFor(['--fps', '4']).animation).toMatchObject({ duration: undefined, fps: 4 });
  });

  it('keeps both timing options when both are given', () => {
    expect(optionsFor(['--fps', '4', '--duration', '0.25']).animation).toMatchObject({ duration: 0.25, fps: 4 });
  });

  it('converts numeric and boolean flags', () => {
    const options = optionsFor([
      '--add-initial-position', 'False',
      '--highlight-last-move', '0',
      '--orientation', 'black',
      '--size', '256',
      '--coordinates', 'f',
      '--css-path', 'board.css',
      '--loop', '2',
      '--palettesize', '100',
      '--subrectangles', 'FALSE',
    ]);

    expect(options).toMatchObject({
      cssPath: 'board.css',
      sequence: { includeInitialPosition: false, highlightLastMove: false },
      render: { orientation: 'black', size: 256, coordinates: false },
      animation: { loop: 2, paletteSize: 100, subrectangles: false },
    });
  });

  it('rejects unparseable booleans', () => {
    expect(captureError(() => optionsFor(['--coordinates', 'maybe']))).toMatchObject({
      kind: 'InvalidArgument',
      code: 'cli.invalid-options',
      message: 'Validation failed: coordinates: cannot parse "maybe" as a boolean, expected one of 1, t, true, 0, f, false',
    });
  });

  it('rejects sizes that are not positive integers', () => {
    for (const size of ['0', '-5', '2.5', 'big']) {
      expect(captureError(() => optionsFor(['--size', size]))).toMatchObject({
        kind: 'InvalidArgument',
        code: 'cli.invalid-options',
      });
    }
  });

  it('rejects palette sizes outside 2..256', () => {
    expect(captureError(() => optionsFor(['--palettesize', '512']))).toMatchObject({ code: 'cli.invalid-options' });
  });
});
