import { describe, it, expect } from 'vitest';
import { extractCode, stripAnsi, truncate } from './string-utils';

describe('stripAnsi', () => {
  it('removes ANSI escape codes', () => {
    expect(stripAnsi('hi \u001b[31mred\u001b[0m there')).toBe('hi red there');
  });
});

describe('extractCode', () => {
  it('takes the last fenced block', () => {
    const reply = [
      'First try:',
      '```cpp',
      'int a;',
      '```',
      'Better:',
      '```cpp',
      '#include <cstdio>',
      'int main() {}',
      '```',
    ].join('\n');
    expect(extractCode(reply)).toBe('#include <cstdio>\nint main() {}');
  });

  it('returns text without fences unchanged', () => {
    expect(extractCode('int main() {}')).toBe('int main() {}');
  });

  it('treats a single fence line as no block', () => {
    expect(extractCode('```cpp\nint x;')).toBe('```cpp\nint x;');
  });

  it('returns an empty body for an empty block', () => {
    expect(extractCode('```\n```')).toBe('');
  });
});

describe('truncate', () => {
  it('cuts long text and appends the marker', () => {
    expect(truncate('abcdef', 3)).toBe('abc\n... [truncated]');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
