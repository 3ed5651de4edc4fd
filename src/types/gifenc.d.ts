declare module 'gifenc' {
  export type PaletteColor = [number, number, number] | [number, number, number, number];

  export type Palette = PaletteColor[];

  export type PixelFormat = 'rgb565' | 'rgb444' | 'rgba4444';

  export interface WriteFrameOptions {
    readonly palette?: Palette;
    readonly first?: boolean;
    readonly transparent?: boolean;
    readonly transparentIndex?: number;
    readonly delay?: number;
    readonly repeat?: number;
    readonly colorDepth?: number;
    readonly dispose?: number;
  }

  export interface GIFEncoderOptions {
    readonly auto?: boolean;
    readonly initialCapacity?: number;
  }

  export interface GIFEncoderStream {
    writeHeader(): void;
    writeFrame(index: Uint8Array, width: number, height: number, options?: WriteFrameOptions): void;
    finish(): void;
    bytes(): Uint8Array;
    bytesView(): Uint8Array;
    reset(): void;
  }

  export interface QuantizeOptions {
    readonly format?: PixelFormat;
    readonly oneBitAlpha?: boolean | number;
    readonly clearAlpha?: boolean;
    readonly clearAlphaThreshold?: number;
    readonly clearAlphaColor?: number;
  }

  export function GIFEncoder(options?: GIFEncoderOptions): GIFEncoderStream;

  export function quantize(
    rgba: Uint8Array | Uint8ClampedArray,
    maxColors: number,
    options?: QuantizeOptions,
  ): Palette;

  export function applyPalette(
    rgba: Uint8Array | Uint8ClampedArray,
    palette: Palette,
    format?: PixelFormat,
  ): Uint8Array;
}
