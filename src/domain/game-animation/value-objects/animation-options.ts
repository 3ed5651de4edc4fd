export interface AnimationOptions {
  /** Number of loops, 0 loops forever. */
  readonly loop: number;
  /** Seconds per frame. Wins over `fps` when both are set. */
  readonly duration?: number;
  readonly fps?: number;
  /** Colour count, rounded to the nearest power of two between 2 and 256. */
  readonly paletteSize: number;
  readonly subrectangles: boolean;
}
