import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createReadlinePrompter, parseMultiSelection, parseSelection } from './prompt';

describe('parseSelection', () => {
  it('maps 1-based answers to indexes', () => {
    expect(parseSelection(' 2 ', 3)).toBe(1);
  });

  it('selects nothing for blank, invalid or out-of-range answers', () => {
    expect(parseSelection('', 3)).toBeUndefined();
    expect(parseSelection('two', 3)).toBeUndefined();
    expect(parseSelection('0', 3)).toBeUndefined();
    expect(parseSelection('4', 3)).toBeUndefined();
  });
});

describe('parseMultiSelection', () => {
  it('accepts numbers and names in typed order without repeats', () => {
    expect(parseMultiSelection('3, work 1 3 unknown', ['work', 'idea', 'draft'])).toEqual([
      'draft',
      'work',
    ]);
  });
});

describe('createReadlinePrompter', () => {
  it('lists candidates and returns the chosen one', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written: string[] = [];
    output.on('data', (chunk: Buffer) => written.push(chunk.toString('utf8')));
    const prompter = createReadlinePrompter({ input, output });

    const pending = prompter.select([
      { display: 'Alpha', path: 'a.md' },
      { display: 'Beta', path: 'b.md' },
    ]);
    input.write('2\n');

    await expect(pending).resolves.toEqual({ display: 'Beta', path: 'b.md' });
    expect(written.join('')).toContain('1) Alpha\n2) Beta\n');
  });

  it('accepts a typed display and resolves it to the first matching note', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter({ input, output });

    const pending = prompter.select([
      { display: 'Weekly', path: '2024/weekly.md' },
      { display: 'Weekly', path: '2023/weekly.md' },
      { display: 'Inbox', path: 'inbox.md' },
    ]);
    input.write('  Weekly \n');

    await expect(pending).resolves.toEqual({ display: 'Weekly', path: '2024/weekly.md' });
  });

  it('selects nothing for an answer matching no candidate', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter({ input, output });

    const pending = prompter.select([{ display: 'Alpha', path: 'a.md' }]);
    input.write('Gamma\n');

    await expect(pending).resolves.toBeUndefined();
  });
});
