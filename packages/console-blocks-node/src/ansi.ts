import type { BlockStyle, BlockVariant } from './types.js';

export const RESET = '\x1b[0m';
export const BRIGHT = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';

// Cursor to the beginning of the previous line.
export const CURSOR_PREVIOUS_LINE = '\x1b[F';

export const styleCodes: Record<BlockStyle, string> = {
  bright: BRIGHT,
  normal: '',
  dim: DIM,
};

export const defaultVariantStyles: Record<BlockVariant, BlockStyle> = {
  header: 'bright',
  body: 'normal',
  footer: 'bright',
};
