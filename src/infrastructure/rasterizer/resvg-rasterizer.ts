import { renderAsync, type RenderedImage, type ResvgRenderOptions } from '@resvg/resvg-js';

import type { Rasterizer } from '../../domain/game-animation/index.js';
import { AppError } from '../../shared/errors/app-error.js';

const RENDER_OPTIONS: ResvgRenderOptions = {
  // the document's own width/height decide the output size
  fitTo: { mode: 'original' },
  font: { loadSystemFonts: true },
  logLevel: 'off',
};

/**
 * SVG to PNG through resvg, which applies `<style>` rules on top of presentation attributes.
 */
export class ResvgRasterizer implements Rasterizer {
  public async rasterize(svg: string): Promise<Buffer> {
    let image: RenderedImage;
    try {
      image = await renderAsync(svg, RENDER_OPTIONS);
    } catch (error) {
      throw AppError.render('rasterizer.invalid-svg', 'Unable to load SVG for rasterization', error);
    }

    if (image.width <= 0 || image.height <= 0) {
      throw AppError.render('rasterizer.invalid-svg', 'SVG has no drawable area', undefined, {
        width: image.width,
        height: image.height,
      });
    }

    return image.asPng();
  }
}
