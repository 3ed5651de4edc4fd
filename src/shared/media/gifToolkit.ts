import { promises as fs } from 'node:fs';

import { decompressFrames, parseGIF } from 'gifuct-js';

import { AppError } from '../errors/app-error.js';

import { calculateFrameTimingStats, type FrameTimingStats } from './frameTiming.js';
import { roundToPrecision } from './numberUtils.js';

export interface GifAnalysis {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
  disposalModes: number[];
  usesTransparency: boolean;
}

export async function analyzeGif(input: string | Buffer): Promise<GifAnalysis> {
  const buffer = await loadGifBuffer(input);
  const gif = parseGifBuffer(buffer);
  // patches are not needed to read frame headers
  const frames = decompressFrames(gif, false);
  const delaysMs = frames.map((frame) => frame.delay ?? 0);
  const durationMs = delaysMs.reduce((total, delay) => total + delay, 0);
  const disposalModes = Array.from(new Set(frames.map((frame) => frame.disposalType ?? 0))).sort(
    (a, b) => a - b,
  );

  return {
    width: gif.lsd.width,
    height: gif.lsd.height,
    frameCount: frames.length,
    durationMs: roundToPrecision(durationMs, 3),
    delaysMs: delaysMs.map((delay) => roundToPrecision(delay, 3)),
    timing: calculateFrameTimingStats(delaysMs),
    disposalModes,
    usesTransparency: frames.some((frame) => frame.transparentIndex !== undefined),
  };
}

async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (typeof input === 'string') {
    try {
      return await fs.readFile(input);
    } catch (error) {
      throw AppError.io('io.read-failed', `Unable to read GIF at ${input}`, error, { path: input });
    }
  }

  return input;
}

function parseGifBuffer(buffer: Buffer): ReturnType<typeof parseGIF> {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  return parseGIF(arrayBuffer);
}
