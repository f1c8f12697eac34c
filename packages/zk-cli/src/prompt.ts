import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

import type { Candidate } from '@zk-query/core';
import { resolveCandidate } from '@zk-query/core';

export interface Prompter {
  text(question: string): Promise<string>;
  select(candidates: Candidate[]): Promise<Candidate | undefined>;
  multiSelect(items: string[]): Promise<string[]>;
}

/** Parses a 1-based choice; blank or out-of-range answers select nothing. */
export function parseSelection(answer: string, count: number): number | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const index = Number.parseInt(trimmed, 10) - 1;
  return index >= 0 && index < count ? index : undefined;
}

/**
 * Parses a comma or space separated answer of item numbers or names,
 * keeping the order typed and dropping repeats and unknown entries.
 */
export function parseMultiSelection(answer: string, items: readonly string[]): string[] {
  const chosen: string[] = [];
  for (const token of answer.split(/[,\s]+/)) {
    if (!token) continue;
    const index = parseSelection(token, items.length);
    const item = index !== undefined ? items[index] : items.find((entry) => entry === token);
    if (item !== undefined && !chosen.includes(item)) {
      chosen.push(item);
    }
  }
  return chosen;
}

function formatChoices(labels: readonly string[]): string {
  const width = String(labels.length).length;
  return labels
    .map((label, index) => `${String(index + 1).padStart(width, ' ')}) ${label}`)
    .join('\n');
}

export function createReadlinePrompter(
  streams: { input: Readable; output: Writable } = { input: process.stdin, output: process.stderr },
): Prompter {
  const ask = async (question: string): Promise<string> => {
    const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  };

  return {
    async text(question) {
      return (await ask(question)).trim();
    },
    async select(candidates) {
      streams.output.write(`${formatChoices(candidates.map((candidate) => candidate.display))}\n`);
      const answer = (await ask('Select a note (number or title): ')).trim();
      const index = parseSelection(answer, candidates.length);
      if (index !== undefined) {
        return candidates[index];
      }
      const notePath = resolveCandidate(candidates, answer);
      return notePath !== undefined ? { display: answer, path: notePath } : undefined;
    },
    async multiSelect(items) {
      if (items.length === 0) {
        return [];
      }
      streams.output.write(`${formatChoices(items)}\n`);
      return parseMultiSelection(await ask('Tags (numbers or names, comma separated): '), items);
    },
  };
}
