import { AppError } from '../errors/app-error.js';

import { roundToPrecision } from './numberUtils.js';

export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
}

export interface FrameTimingInput {
  /** Seconds each frame stays on screen. Takes precedence over `fps`. */
  readonly duration?: number;
  readonly fps?: number;
}

export function calculateFrameTimingStats(delaysMs: number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundToPrecision(average, 3),
    minDelayMs: roundToPrecision(min, 3),
    maxDelayMs: roundToPrecision(max, 3),
    stdDeviationMs: roundToPrecision(stdDeviation, 3),
    fps: roundToPrecision(fps, 3),
  };
}

export function resolveFrameDelayMs(timing: FrameTimingInput): number {
  if (timing.duration !== undefined) {
    if (!(timing.duration > 0)) {
      throw AppError.invalidArgument('animation.invalid-duration', `Frame duration must be positive, got ${timing.duration}`);
    }

    return timing.duration * 1000;
  }

  if (timing.fps !== undefined) {
    if (!(timing.fps > 0)) {
      throw AppError.invalidArgument('animation.invalid-fps', `Frame rate must be positive, got ${timing.fps}`);
    }

    return 1000 / timing.fps;
  }

  throw AppError.invalidArgument(
    'animation.missing-timing',
    'duration and fps cannot both be unset',
  );
}
