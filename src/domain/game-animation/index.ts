export * from './contracts/animation-encoder.js';
export * from './contracts/board-renderer.js';
export * from './contracts/game-parser.js';
export * from './contracts/rasterizer.js';
export * from './entities/game-record.js';
export * from './value-objects/animation-options.js';
export * from './value-objects/board-position.js';
export * from './value-objects/render-options.js';
