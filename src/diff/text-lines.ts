/**
 * Split content into lines, each keeping its terminating '\n'.
 * Only the final line can lack a terminator. Empty content has no lines.
 */
export function splitLines(content: string): string[] {
  const lines: string[] = [];
  let start = 0;

  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    if (newline === -1) {
      lines.push(content.slice(start));
      break;
    }
    lines.push(content.slice(start, newline + 1));
    start = newline + 1;
  }

  return lines;
}

export function hasTerminator(line: string): boolean {
  return line.endsWith('\n');
}

export function stripTerminator(line: string): string {
  return hasTerminator(line) ? line.slice(0, -1) : line;
}
