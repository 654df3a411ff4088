import { describe, it, expect } from 'vitest';
import { firstDifferingLine, normalizeOutput, outputsMatch } from './compare';

describe('outputsMatch', () => {
  it('ignores trailing whitespace on lines and trailing newlines', () => {
    expect(outputsMatch('1 2\n3\n', '1 2  \n3\t\n\n\n')).toBe(true);
  });

  it('treats CRLF as LF', () => {
    expect(outputsMatch('a\nb\n', 'a\r\nb\r\n')).toBe(true);
  });

  it('keeps leading whitespace and inner spacing significant', () => {
    expect(outputsMatch('1 2', ' 1 2')).toBe(false);
    expect(outputsMatch('1 2', '1  2')).toBe(false);
  });

  it('keeps blank lines between content significant', () => {
    expect(outputsMatch('a\nb', 'a\n\nb')).toBe(false);
  });

  it('treats empty and whitespace-only output as equal', () => {
    expect(outputsMatch('', '\n  \n')).toBe(true);
  });
});

describe('normalizeOutput', () => {
  it('produces the canonical text', () => {
    expect(normalizeOutput('x \r\ny\t\n\n')).toBe('x\ny');
  });
});

describe('firstDifferingLine', () => {
  it('points at the first mismatch', () => {
    expect(firstDifferingLine('1\n2\n3', '1\n2\n4')).toBe(3);
    expect(firstDifferingLine('1\n2', '1\n2\n')).toBeNull();
    expect(firstDifferingLine('1', '1\n2')).toBe(2);
  });
});
