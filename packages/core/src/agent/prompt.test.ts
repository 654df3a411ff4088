import { describe, it, expect } from 'vitest';
import { buildPrompt } from './prompt';

describe('buildPrompt', () => {
  const limits = { maxTurns: 7, maxSubmissions: 3 };

  it('fills in the quotas and the statement', async () => {
    const prompt = await buildPrompt({ statement: 'Print the sum of two integers.' }, limits);

    expect(prompt).toContain('You may make at most 3 submissions in at most 7 turns.');
    expect(prompt).toContain('contextual files:\nPrint the sum of two integers.');
    expect(prompt).not.toContain('{statement}');
  });

  it('leaves braces inside the statement alone', async () => {
    const prompt = await buildPrompt({ statement: 'Output {maxTurns} verbatim.' }, limits);

    expect(prompt).toContain('contextual files:\nOutput {maxTurns} verbatim.');
  });

  it('notes a missing statement', async () => {
    const prompt = await buildPrompt({ statement: '   ' }, limits);

    expect(prompt).toContain('(No statement was provided with this problem.)');
  });
});
