export { createBlock, MIN_BLOCK_WIDTH } from './block.js';
export { withAsyncBlock, withBlock } from './blockDecorator.js';
export { DEFAULT_TERMINAL_WIDTH, getTerminalWidth } from './terminal.js';
export { centerText, wrapText } from './text.js';
export type {
  Block,
  BlockConfig,
  BlockDecoratorOptions,
  BlockLine,
  BlockOutput,
  BlockStyle,
  BlockVariant,
  InlineAction,
} from './types.js';
