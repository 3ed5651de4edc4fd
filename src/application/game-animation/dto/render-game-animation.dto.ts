import { z } from 'zod';

export const boardSequenceOptionsSchema = z.object({
  includeInitialPosition: z.boolean().default(true),
  highlightLastMove: z.boolean().default(true),
});

export const boardRenderOptionsSchema = z.object({
  orientation: z.enum(['white', 'black']).default('white'),
  size: z.number().int().positive().default(400),
  coordinates: z.boolean().default(true),
  style: z.string().optional(),
});

export const animationOptionsSchema = z
  .object({
    loop: z.number().int().nonnegative().default(0),
    duration: z.number().positive().optional(),
    fps: z.number().positive().optional(),
    paletteSize: z.number().int().min(2).max(256).default(64),
    subrectangles: z.boolean().default(true),
  })
  .refine((options) => options.duration !== undefined || options.fps !== undefined, {
    message: 'duration and fps cannot both be unset',
    path: ['duration'],
  });

export const renderGameAnimationCommandSchema = z.object({
  pgn: z.string(),
  sequence: boardSequenceOptionsSchema.default({}),
  render: boardRenderOptionsSchema.default({}),
  animation: animationOptionsSchema,
});

export type RenderGameAnimationInput = z.input<typeof renderGameAnimationCommandSchema>;

export type RenderGameAnimationPayload = z.output<typeof renderGameAnimationCommandSchema>;
