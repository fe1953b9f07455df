import {
  BRIGHT,
  CURSOR_PREVIOUS_LINE,
  DIM,
  GREEN,
  RESET,
  defaultVariantStyles,
  styleCodes,
} from './ansi.js';
import { getTerminalWidth } from './terminal.js';
import { centerText, wrapText } from './text.js';
import type { Block, BlockConfig, BlockOutput, InlineAction } from './types.js';

export const MIN_BLOCK_WIDTH = 4;

type DrawStep = { kind: 'write'; text: string } | { kind: 'inline-action'; action: InlineAction };

/** Steps drawn before and after the block's own action. */
interface DrawPlan {
  before: DrawStep[];
  after: DrawStep[];
}

interface BlockFrame {
  width: number;
  style: string;
}

function resolveWidth(width: number | undefined): number {
  const requested = width ?? getTerminalWidth();
  if (!Number.isFinite(requested)) {
    return MIN_BLOCK_WIDTH;
  }
  return Math.max(MIN_BLOCK_WIDTH, Math.floor(requested));
}

function verticalLine(frame: BlockFrame): string {
  return RESET + frame.style + '|' + RESET;
}

function horizontalLine(frame: BlockFrame, edge = '+'): string {
  return edge + '-'.repeat(frame.width - 2) + edge;
}

function successLabel(frame: BlockFrame): string {
  return RESET + BRIGHT + GREEN + centerText('success', frame.width - 2) + RESET;
}

// Every write ends with a newline, so moving up N lines lands N - 1 lines above the cursor.
function moveCursorUp(lines: number): DrawStep {
  return { kind: 'write', text: CURSOR_PREVIOUS_LINE.repeat(lines) };
}

function planBody(frame: BlockFrame, config: BlockConfig): DrawStep[] {
  const vline = verticalLine(frame);
  const inner = frame.width - 2;
  const steps: DrawStep[] = [];

  for (const line of config.lines) {
    if (typeof line === 'string') {
      for (const physical of wrapText(line, frame.width)) {
        steps.push({ kind: 'write', text: vline + frame.style + centerText(physical, inner) + vline });
      }
      continue;
    }

    const [text, action] = line;
    for (const physical of wrapText(text, frame.width)) {
      steps.push({ kind: 'write', text: vline + frame.style + DIM + centerText(physical, inner) + vline });
    }
    steps.push({ kind: 'inline-action', action });
    steps.push(moveCursorUp(1));
    steps.push({ kind: 'write', text: frame.style + vline + successLabel(frame) + vline });
    const separator = '|' + '-'.repeat(Math.floor((frame.width - 4) / 2)) + '|';
    steps.push({ kind: 'write', text: vline + frame.style + DIM + centerText(separator, inner) + vline });
  }

  return steps;
}

function planDraw(frame: BlockFrame, config: BlockConfig): DrawPlan {
  const variant = config.variant ?? 'body';
  const body = planBody(frame, config);

  if (variant === 'body') {
    const border: DrawStep = { kind: 'write', text: frame.style + horizontalLine(frame, verticalLine(frame)) };
    return {
      before: [...body, border],
      after: [
        moveCursorUp(2),
        { kind: 'write', text: frame.style + verticalLine(frame) + successLabel(frame) + verticalLine(frame) },
        border,
      ],
    };
  }

  const border: DrawStep = { kind: 'write', text: frame.style + horizontalLine(frame) };
  const framed: DrawStep[] = [border, ...body, border];
  return { before: variant === 'footer' ? [moveCursorUp(2), ...framed] : framed, after: [] };
}

const noop = (): undefined => undefined;

/**
 * Creates a bordered console block. Rendering draws the lines in the frame of the
 * variant and runs the action at the point the variant dictates; errors thrown by the
 * action or by inline actions propagate and leave whatever was drawn so far.
 */
export function createBlock<R>(config: BlockConfig & { action: () => R }): Block<R>;
export function createBlock(config: BlockConfig): Block<undefined>;
export function createBlock<R>(config: BlockConfig & { action?: () => R }): Block<unknown> {
  const width = resolveWidth(config.width);
  const variant = config.variant ?? 'body';
  const style = config.style ?? defaultVariantStyles[variant];
  const frame: BlockFrame = { width, style: styleCodes[style] };
  const action: () => R | undefined = config.action ?? noop;
  const output: BlockOutput = config.output ?? process.stdout;

  const writeLine = (text: string) => {
    output.write(text + '\n');
  };

  const drawSteps = (steps: DrawStep[]) => {
    for (const step of steps) {
      if (step.kind === 'write') {
        writeLine(step.text);
      } else {
        step.action();
      }
    }
  };

  const drawStepsAsync = async (steps: DrawStep[]) => {
    for (const step of steps) {
      if (step.kind === 'write') {
        writeLine(step.text);
      } else {
        await step.action();
      }
    }
  };

  const block: Block<R | undefined> = {
    lines: config.lines,
    width,
    variant,
    style,

    render() {
      const plan = planDraw(frame, config);
      drawSteps(plan.before);
      const result = action();
      drawSteps(plan.after);
      return result;
    },

    async renderAsync(): Promise<Awaited<R | undefined>> {
      const plan = planDraw(frame, config);
      await drawStepsAsync(plan.before);
      const result = await action();
      await drawStepsAsync(plan.after);
      return result;
    },
  };

  return Object.freeze(block);
}
