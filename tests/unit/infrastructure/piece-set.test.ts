import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadPieceSet } from '@/infrastructure/board-renderer/piece-set.js';

import { captureError } from '../../helpers/errors.js';

describe('loadPieceSet', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = mkdtempSync(path.join(os.tmpdir(), 'pgn2gif-pieces-'));
  });

  afterEach(() => {
    rmSync(workspace, { recursive: true, force: true });
  });

  it('loads the bundled set once', () => {
    const pieces = loadPieceSet();

    expect(pieces.squareSize).toBe(45);
    expect(Object.keys(pieces.pieces).sort()).toEqual(['b', 'k', 'n', 'p', 'q', 'r']);
    expect(loadPieceSet()).toBe(pieces);
  });

  it('rejects a set with missing pieces', () => {
    const file = path.join(workspace, 'pieces.json');
    writeFileSync(file, JSON.stringify({ squareSize: 45, strokeWidth: 1, pieces: {} }));

    expect(captureError(() => loadPieceSet(pathToFileURL(file)))).toMatchObject({
      kind: 'InvalidArgument',
      code: 'board-renderer.invalid-piece-set',
    });
  });

  it('reports unreadable files as IO errors', () => {
    expect(captureError(() => loadPieceSet(pathToFileURL(path.join(workspace, 'missing.json'))))).toMatchObject({
      kind: 'IOError',
      code: 'io.read-failed',
    });
  });
});
