/**
 * Canonical form used for exact comparison: CRLF becomes LF, trailing spaces
 * and tabs are dropped from every line, and trailing newlines are removed.
 */
export function normalizeOutput(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/\n+$/, '');
}

export function outputsMatch(expected: string, produced: string): boolean {
  return normalizeOutput(expected) === normalizeOutput(produced);
}

/** 1-based line number of the first difference, or null when equal. */
export function firstDifferingLine(expected: string, produced: string): number | null {
  const a = normalizeOutput(expected).split('\n');
  const b = normalizeOutput(produced).split('\n');
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return i + 1;
  }
  return null;
}
