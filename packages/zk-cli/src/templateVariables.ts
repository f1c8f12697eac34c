import { MalformedArgsError } from '@zk-query/core';

function parseTemplateVariable(entry: string): [string, string] {
  const separator = entry.indexOf('=');
  const name = separator === -1 ? '' : entry.slice(0, separator).trim();
  if (!name) {
    throw new MalformedArgsError(`Template variable must be name=value, got "${entry}"`);
  }
  return [name, entry.slice(separator + 1).trim()];
}

/**
 * Turns repeated `--extra name=value` flags into the `extra` map sent with
 * `zk.new`. Later entries override earlier ones.
 */
export function parseTemplateVariables(entries: readonly string[] = []): Record<string, string> {
  return Object.fromEntries(entries.map((entry) => parseTemplateVariable(entry)));
}
