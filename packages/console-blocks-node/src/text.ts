/**
 * Greedy word wrap. Whitespace runs collapse to a single space and a word longer than
 * `width` is split into `width`-sized chunks. Blank input yields no lines.
 */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(1, Math.floor(width));
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (current && current.length + 1 + word.length <= limit) {
      current = `${current} ${word}`;
      continue;
    }

    if (current) {
      lines.push(current);
      current = '';
    }

    let rest = word;
    while (rest.length > limit) {
      lines.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}

/**
 * Pads `text` on both sides to `width`. An odd padding column goes to the left when
 * `width` is odd too, otherwise to the right. Never truncates.
 */
export function centerText(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2) + (padding & width & 1);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}
