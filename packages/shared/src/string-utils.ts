export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

const FENCE = '```';

/**
 * Returns the body of the last fenced block: the lines strictly between the
 * last two lines that contain a triple backtick. Text without a complete
 * fence is returned unchanged, so bare source is accepted as-is.
 */
export function extractCode(text: string): string {
  const lines = text.split('\n');
  const fenceLines: number[] = [];
  lines.forEach((line, i) => {
    if (line.includes(FENCE)) fenceLines.push(i);
  });
  if (fenceLines.length < 2) {
    return text;
  }
  const open = fenceLines[fenceLines.length - 2];
  const close = fenceLines[fenceLines.length - 1];
  return lines.slice(open + 1, close).join('\n');
}

/** Keeps at most `maxLength` characters, marking the cut. */
export function truncate(text: string, maxLength: number, marker = '\n... [truncated]'): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength) + marker;
}
