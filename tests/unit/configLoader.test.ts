import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { ConfigError } from '../../src/common/errors';
import { applyProfile, loadConfig, parseConfig, sampleConfig } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'deny-guard-config-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('Config loader', () => {
  it('loads YAML config and merges profiles', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        [
          'backend: automaton',
          'limits:',
          '  maxDepth: 8',
          '  maxBytes: 4096',
          'lists:',
          '  - name: profanity',
          '    priority: 10',
          '    words: [spam, scam]',
          'server:',
          '  port: 4100',
          'profiles:',
          '  ci:',
          '    backend: compact-trie',
          '    limits:',
          '      maxDepth: 4',
          '    server:',
          '      host: 0.0.0.0',
          '',
        ].join('\n'),
      );

      const base = await loadConfig(configPath);
      expect(base.backend).toBe('automaton');
      expect(base.emptyPolicy).toBe('error');
      expect(base.redactWords).toBe(true);
      expect(base.lists).toEqual([{ name: 'profanity', priority: 10, words: ['spam', 'scam'] }]);

      const profile = await loadConfig(configPath, 'ci');
      expect(profile.backend).toBe('compact-trie');
      expect(profile.limits).toEqual({ maxDepth: 4, maxBytes: 4096 });
      expect(profile.server).toEqual({ host: '0.0.0.0', port: 4100 });
      expect(profile.lists).toEqual(base.lists);
    });
  });

  it('loads TOML config', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.toml');
      await writeFile(
        configPath,
        [
          'backend = "alternation"',
          'emptyPolicy = "never-match"',
          '',
          '[[lists]]',
          'name = "internal"',
          'priority = 2',
          'words = ["project-codename"]',
          '',
        ].join('\n'),
      );

      const config = await loadConfig(configPath);
      expect(config.backend).toBe('alternation');
      expect(config.emptyPolicy).toBe('never-match');
      expect(config.lists).toEqual([{ name: 'internal', priority: 2, words: ['project-codename'] }]);
    });
  });

  it('accepts the deny_word_lists alias with a default priority', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.json');
      await writeFile(configPath, JSON.stringify({ deny_word_lists: [{ name: 'legacy', words: ['alpha'] }] }));

      const config = await loadConfig(configPath);
      expect(config.lists).toEqual([{ name: 'legacy', priority: 0, words: ['alpha'] }]);
    });
  });

  it('throws when the lists section is missing', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'broken.toml');
      await writeFile(configPath, `backend = "automaton"`);

      await expect(loadConfig(configPath)).rejects.toThrow(/must define a "lists" section/);
    });
  });

  it('wraps parse failures and unknown formats in ConfigError', async () => {
    await withTempDir(async (dir) => {
      const broken = join(dir, 'broken.json');
      await writeFile(broken, '{ "lists": [');
      await expect(loadConfig(broken)).rejects.toBeInstanceOf(ConfigError);

      const ini = join(dir, 'config.ini');
      await writeFile(ini, 'lists=');
      await expect(loadConfig(ini)).rejects.toThrow(/Unsupported config format/);
    });
  });
});

describe('parseConfig', () => {
  it('rejects invalid fields', () => {
    expect(() => parseConfig({ lists: [{ name: 'a', words: 'spam' }] })).toThrow('lists[0].words must be a list of strings');
    expect(() => parseConfig({ lists: [{ name: 'a', priority: 1.5, words: [] }] })).toThrow(
      'lists[0].priority must be an integer',
    );
    expect(() =>
      parseConfig({
        lists: [
          { name: 'a', words: [] },
          { name: 'a', words: [] },
        ],
      }),
    ).toThrow('lists[1].name "a" is already used by another list');
    expect(() => parseConfig({ backend: 'bloom', lists: [] })).toThrow(
      'backend must be one of automaton, alternation, compact-trie',
    );
    expect(() => parseConfig({ lists: [], limits: { maxDepth: 0 } })).toThrow('limits.maxDepth must be a positive integer');
    expect(() => parseConfig({ lists: [], server: { port: 70000 } })).toThrow(
      'server.port must be an integer between 0 and 65535',
    );
    expect(() => parseConfig(['lists'])).toThrow('config must contain a mapping at the top level');
  });

  it('prefixes profile errors with the profile path', () => {
    expect(() => parseConfig({ lists: [], profiles: { fast: { backend: 'regex' } } })).toThrow(
      'profiles.fast.backend must be one of automaton, alternation, compact-trie',
    );
  });

  it('reports unknown profiles', () => {
    const config = parseConfig({ lists: [] });
    expect(() => applyProfile(config, 'missing')).toThrow('Profile missing not found in config');
  });

  it('parses the sample config written by init', () => {
    const config = parseConfig(loadYaml(sampleConfig()));
    expect(config.lists.map((list) => list.name)).toEqual(['profanity', 'internal']);
    expect(config.server).toEqual({ host: '127.0.0.1', port: 4100 });
    expect(applyProfile(config, 'fast').backend).toBe('compact-trie');
  });
});
