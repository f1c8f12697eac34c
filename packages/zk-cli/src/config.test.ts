import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from './config';

describe('loadConfig', () => {
  const originalEnv = { ...process.env };
  let cwd = '';

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'zk-query-config-'));
    delete process.env['ZK_QUERY_ZK_PATH'];
    delete process.env['ZK_QUERY_EDITOR'];
    delete process.env['EDITOR'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', () => {
    expect(loadConfig(cwd)).toEqual({
      server: { command: 'zk', args: ['lsp'] },
      display: { includeTags: true, includeCreated: false, includeModified: false },
      shortcuts: { daily: { dir: 'journal/daily' } },
    });
  });

  it('loads YAML config and merges shortcuts over the built-in ones', () => {
    fs.writeFileSync(
      path.join(cwd, 'zk-query.config.yaml'),
      [
        'server:',
        '  command: /opt/zk/bin/zk',
        'display:',
        '  includeCreated: true',
        'shortcuts:',
        '  meeting:',
        '    dir: meetings',
        '    template: meeting.md',
        'editor: nvim',
      ].join('\n'),
      'utf8',
    );

    const config = loadConfig(cwd);

    expect(config.server).toEqual({ command: '/opt/zk/bin/zk', args: ['lsp'] });
    expect(config.display.includeCreated).toBe(true);
    expect(config.shortcuts).toEqual({
      daily: { dir: 'journal/daily' },
      meeting: { dir: 'meetings', template: 'meeting.md' },
    });
    expect(config.editor).toBe('nvim');
  });

  it('prefers environment variables over the config file', () => {
    process.env['ZK_QUERY_ZK_PATH'] = '/usr/local/bin/zk';
    process.env['ZK_QUERY_EDITOR'] = 'hx';
    fs.writeFileSync(
      path.join(cwd, 'zk-query.config.json'),
      JSON.stringify({ server: { command: 'zk-file' }, editor: 'nvim' }),
      'utf8',
    );

    const config = loadConfig(cwd);

    expect(config.server.command).toBe('/usr/local/bin/zk');
    expect(config.editor).toBe('hx');
  });

  it('uses EDITOR only when nothing else names an editor', () => {
    process.env['EDITOR'] = 'vi';

    expect(loadConfig(cwd).editor).toBe('vi');
  });

  it('rejects shortcuts with unknown creation keys', () => {
    fs.writeFileSync(
      path.join(cwd, 'zk-query.config.json'),
      JSON.stringify({ shortcuts: { weekly: { folder: 'journal/weekly' } } }),
      'utf8',
    );

    expect(() => loadConfig(cwd)).toThrow(ConfigError);
    expect(() => loadConfig(cwd)).toThrow(/^Invalid zk-query\.config\.json: shortcuts\.weekly/);
  });
});
