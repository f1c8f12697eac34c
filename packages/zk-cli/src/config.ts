import fs from 'node:fs';
import path from 'node:path';

import type { CandidateDisplayOptions, CreationArgs } from '@zk-query/core';
import { CreationArgsSchema } from '@zk-query/core';
import yaml from 'yaml';
import { z } from 'zod';

export interface ZkQueryConfig {
  server: {
    command: string;
    args: string[];
  };
  display: Required<CandidateDisplayOptions>;
  shortcuts: Record<string, CreationArgs>;
  /** Command used to open created or selected notes; paths are printed when unset. */
  editor?: string;
}

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

const ConfigFileSchema = z.object({
  server: z
    .object({
      command: NonEmptyTrimmedStringSchema.optional(),
      args: z.array(z.string()).optional(),
    })
    .optional(),
  display: z
    .object({
      includeTags: z.boolean().optional(),
      includeCreated: z.boolean().optional(),
      includeModified: z.boolean().optional(),
    })
    .optional(),
  shortcuts: z.record(NonEmptyTrimmedStringSchema, CreationArgsSchema).optional(),
  editor: NonEmptyTrimmedStringSchema.optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_SHORTCUTS: Record<string, CreationArgs> = {
  daily: { dir: 'journal/daily' },
};

const DEFAULT_CONFIG_FILENAMES = [
  'zk-query.config.json',
  'zk-query.config.yaml',
  'zk-query.config.yml',
];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(cwd: string = process.cwd()): ZkQueryConfig {
  const configPath = findConfigFile(cwd);
  const file = configPath ? readConfigFile(configPath) : {};

  const envZkPath = process.env['ZK_QUERY_ZK_PATH']?.trim();
  const envEditor = process.env['ZK_QUERY_EDITOR']?.trim();
  const fallbackEditor = process.env['EDITOR']?.trim();

  const config: ZkQueryConfig = {
    server: {
      command: envZkPath || file.server?.command || 'zk',
      args: file.server?.args ?? ['lsp'],
    },
    display: {
      includeTags: file.display?.includeTags ?? true,
      includeCreated: file.display?.includeCreated ?? false,
      includeModified: file.display?.includeModified ?? false,
    },
    shortcuts: {
      ...DEFAULT_SHORTCUTS,
      ...(file.shortcuts ?? {}),
    },
  };
  const editor = envEditor || file.editor || fallbackEditor;
  if (editor) {
    config.editor = editor;
  }
  return config;
}

function readConfigFile(configPath: string): ConfigFile {
  const content = fs.readFileSync(configPath, 'utf8');
  let raw: unknown;
  try {
    raw = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${path.basename(configPath)}: ${reason}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${path.basename(configPath)}: ${details}`);
  }
  return parsed.data;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}
