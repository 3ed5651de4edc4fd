export * from './commands/render-game-animation.command.js';
export * from './dto/render-game-animation.dto.js';
export * from './handlers/render-game-animation.handler.js';
