export type BlockVariant = 'header' | 'body' | 'footer';

export type BlockStyle = 'bright' | 'normal' | 'dim';

export type InlineAction = () => unknown;

/** Plain text, or text paired with a step that runs right after the text is drawn. */
export type BlockLine = string | readonly [text: string, action: InlineAction];

export interface BlockOutput {
  write(chunk: string): unknown;
}

export interface BlockConfig {
  lines: readonly BlockLine[];
  width?: number;
  variant?: BlockVariant;
  style?: BlockStyle;
  output?: BlockOutput;
}

export interface Block<R> {
  readonly lines: readonly BlockLine[];
  readonly width: number;
  readonly variant: BlockVariant;
  readonly style: BlockStyle;
  render(): R;
  renderAsync(): Promise<Awaited<R>>;
}

export type BlockDecoratorOptions = Omit<BlockConfig, 'lines'>;
