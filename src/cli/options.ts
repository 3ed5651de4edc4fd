import { z } from 'zod';

import { AppError } from '../shared/errors/app-error.js';

export const DEFAULT_FRAME_DURATION_SECONDS = 1.0;

const TRUE_TOKENS = new Set(['1', 't', 'true']);
const FALSE_TOKENS = new Set(['0', 'f', 'false']);

export const BOOLEAN_TOKENS = [...TRUE_TOKENS, ...FALSE_TOKENS];

export function parseBooleanToken(value: string): boolean | undefined {
  const token = value.toLowerCase();

  if (TRUE_TOKENS.has(token)) {
    return true;
  }

  if (FALSE_TOKENS.has(token)) {
    return false;
  }

  return undefined;
}

const booleanToken = z.string().transform((value, ctx) => {
  const parsed = parseBooleanToken(value);

  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `cannot parse "${value}" as a boolean, expected one of ${BOOLEAN_TOKENS.join(', ')}`,
    });
    return z.NEVER;
  }

  return parsed;
});

const numberString = z.string().trim().min(1, 'expected a number').pipe(z.coerce.number());

const rawCliOptionsSchema = z.object({
  pgnPath: z.string().min(1),
  gifPath: z.string().min(1),
  addInitialPosition: booleanToken,
  highlightLastMove: booleanToken,
  orientation: z.enum(['white', 'black']),
  size: numberString.pipe(z.number().int().positive()),
  coordinates: booleanToken,
  cssPath: z.string().min(1).optional(),
  loop: numberString.pipe(z.number().int().nonnegative()),
  duration: numberString.pipe(z.number().positive()).optional(),
  fps: numberString.pipe(z.number().positive()).optional(),
  palettesize: numberString.pipe(z.number().int().min(2).max(256)),
  subrectangles: booleanToken,
});

export const cliOptionsSchema = rawCliOptionsSchema.transform((options) => ({
  pgnPath: options.pgnPath,
  gifPath: options.gifPath,
  cssPath: options.cssPath,
  sequence: {
    includeInitialPosition: options.addInitialPosition,
    highlightLastMove: options.highlightLastMove,
  },
  render: {
    orientation: options.orientation,
    size: options.size,
    coordinates: options.coordinates,
  },
  animation: {
    loop: options.loop,
    // --fps alone drives the timing; duration wins whenever it is given
    duration:
      options.duration ?? (options.fps === undefined ? DEFAULT_FRAME_DURATION_SECONDS : undefined),
    fps: options.fps,
    paletteSize: options.palettesize,
    subrectangles: options.subrectangles,
  },
}));

export type CliOptions = z.output<typeof cliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = cliOptionsSchema.safeParse(raw);

  if (!parsed.success) {
    throw AppError.validation('cli.invalid-options', { issues: parsed.error.issues });
  }

  return parsed.data;
}
