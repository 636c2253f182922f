/**
 * Usage text helpers
 */

/**
 * Greedy word wrap. Runs of whitespace collapse to one space, every line is
 * prefixed with `indent`, and words longer than a line are split.
 */
export function wrap(text: string, width: number, indent = ''): string[] {
  const words = text.split(/\s+/).filter(word => word.length > 0);
  const room = Math.max(1, width - indent.length);
  const lines: string[] = [];
  let line = '';

  for (let word of words) {
    if (line.length > 0 && line.length + 1 + word.length <= room) {
      line += ` ${word}`;
      continue;
    }
    if (line.length > 0) {
      lines.push(indent + line);
      line = '';
    }
    while (word.length > room) {
      lines.push(indent + word.slice(0, room));
      word = word.slice(room);
    }
    line = word;
  }

  if (line.length > 0) {
    lines.push(indent + line);
  }
  return lines;
}
