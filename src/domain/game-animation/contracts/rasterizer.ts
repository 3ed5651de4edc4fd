export interface Rasterizer {
  /** Converts an SVG document into PNG bytes. */
  rasterize(svg: string): Promise<Buffer>;
}
