export const DEFAULT_TERMINAL_WIDTH = 80;

export function getTerminalWidth(defaultWidth = DEFAULT_TERMINAL_WIDTH): number {
  const columns = process.stdout.columns;
  return typeof columns === 'number' && columns > 0 ? columns : defaultWidth;
}
