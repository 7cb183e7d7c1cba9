import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigError } from '../common/errors';
import type { DenyWordList, EmptyPolicy } from '../compiler';
import { BACKEND_KINDS, isBackendKind } from '../matchers';
import { DenyGuardConfig, DenyGuardProfile, LimitsConfig, ServerConfig } from './types';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, where: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${where} must be a positive integer`);
  }
  return value;
}

function parseLists(value: unknown, where: string): DenyWordList[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${where} must be a list of deny word lists`);
  }
  const names = new Set<string>();
  return value.map((entry: unknown, index) => {
    const at = `${where}[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${at} must be an object with name, priority and words`);
    }
    const { name, priority = 0, words } = entry;
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ConfigError(`${at}.name must be a non-empty string`);
    }
    if (names.has(name)) {
      throw new ConfigError(`${at}.name "${name}" is already used by another list`);
    }
    names.add(name);
    if (typeof priority !== 'number' || !Number.isInteger(priority)) {
      throw new ConfigError(`${at}.priority must be an integer`);
    }
    if (!Array.isArray(words)) {
      throw new ConfigError(`${at}.words must be a list of strings`);
    }
    const checkedWords = words.map((word: unknown, wordIndex) => {
      if (typeof word !== 'string') {
        throw new ConfigError(`${at}.words[${wordIndex}] must be a string`);
      }
      return word;
    });
    return { name, priority, words: checkedWords };
  });
}

function parseLimits(value: unknown, where: string): LimitsConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const limits: LimitsConfig = {};
  const maxDepth = positiveInt(value.maxDepth, `${where}.maxDepth`);
  const maxBytes = positiveInt(value.maxBytes, `${where}.maxBytes`);
  const maxPatterns = positiveInt(value.maxPatterns, `${where}.maxPatterns`);
  if (maxDepth !== undefined) {
    limits.maxDepth = maxDepth;
  }
  if (maxBytes !== undefined) {
    limits.maxBytes = maxBytes;
  }
  if (maxPatterns !== undefined) {
    limits.maxPatterns = maxPatterns;
  }
  return limits;
}

function parseServer(value: unknown, where: string): ServerConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const server: ServerConfig = {};
  if (value.host !== undefined && value.host !== null) {
    if (typeof value.host !== 'string') {
      throw new ConfigError(`${where}.host must be a string`);
    }
    server.host = value.host;
  }
  if (value.port !== undefined && value.port !== null) {
    if (typeof value.port !== 'number' || !Number.isInteger(value.port) || value.port < 0 || value.port > 65535) {
      throw new ConfigError(`${where}.port must be an integer between 0 and 65535`);
    }
    server.port = value.port;
  }
  return server;
}

function parseEmptyPolicy(value: unknown, where: string): EmptyPolicy {
  if (value === 'error' || value === 'never-match') {
    return value;
  }
  throw new ConfigError(`${where} must be "error" or "never-match"`);
}

/** Validates the sections present in `raw`; absent sections stay absent. */
function parseSections(raw: RawRecord, where: string): DenyGuardProfile {
  const sections: DenyGuardProfile = {};
  const lists = raw.lists ?? raw.deny_word_lists;
  if (lists !== undefined) {
    sections.lists = parseLists(lists, `${where}lists`);
  }
  if (raw.backend !== undefined) {
    if (!isBackendKind(raw.backend)) {
      throw new ConfigError(`${where}backend must be one of ${BACKEND_KINDS.join(', ')}`);
    }
    sections.backend = raw.backend;
  }
  if (raw.emptyPolicy !== undefined) {
    sections.emptyPolicy = parseEmptyPolicy(raw.emptyPolicy, `${where}emptyPolicy`);
  }
  if (raw.limits !== undefined) {
    sections.limits = parseLimits(raw.limits, `${where}limits`);
  }
  if (raw.redactWords !== undefined) {
    if (typeof raw.redactWords !== 'boolean') {
      throw new ConfigError(`${where}redactWords must be a boolean`);
    }
    sections.redactWords = raw.redactWords;
  }
  if (raw.pluginName !== undefined) {
    if (typeof raw.pluginName !== 'string' || raw.pluginName.length === 0) {
      throw new ConfigError(`${where}pluginName must be a non-empty string`);
    }
    sections.pluginName = raw.pluginName;
  }
  if (raw.server !== undefined && raw.server !== null) {
    sections.server = parseServer(raw.server, `${where}server`);
  }
  return sections;
}

export function parseConfig(raw: unknown, source = 'config'): DenyGuardConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must contain a mapping at the top level`);
  }
  const sections = parseSections(raw, '');
  if (!sections.lists) {
    throw new ConfigError(`${source} must define a "lists" section`);
  }

  const config: DenyGuardConfig = {
    backend: sections.backend ?? 'automaton',
    emptyPolicy: sections.emptyPolicy ?? 'error',
    lists: sections.lists,
    limits: sections.limits ?? {},
    redactWords: sections.redactWords ?? true,
  };
  if (sections.pluginName) {
    config.pluginName = sections.pluginName;
  }
  if (sections.server) {
    config.server = sections.server;
  }

  if (raw.profiles !== undefined) {
    if (!isRecord(raw.profiles)) {
      throw new ConfigError(`${source} profiles must be a mapping of profile names`);
    }
    const profiles: Record<string, DenyGuardProfile> = {};
    for (const [name, profile] of Object.entries(raw.profiles)) {
      if (!isRecord(profile)) {
        throw new ConfigError(`Profile ${name} must be a mapping`);
      }
      profiles[name] = parseSections(profile, `profiles.${name}.`);
    }
    config.profiles = profiles;
  }
  return config;
}

export function applyProfile(config: DenyGuardConfig, profile: string): DenyGuardConfig {
  const overlay = config.profiles?.[profile];
  if (!overlay) {
    throw new ConfigError(`Profile ${profile} not found in config`);
  }
  return mergeConfigs(config, overlay);
}

function mergeConfigs(base: DenyGuardConfig, overlay: DenyGuardProfile): DenyGuardConfig {
  const merged: DenyGuardConfig = {
    ...base,
    ...overlay,
    lists: overlay.lists ?? base.lists,
    limits: {
      ...base.limits,
      ...overlay.limits,
    },
  };
  if (base.server || overlay.server) {
    merged.server = { ...base.server, ...overlay.server };
  }
  return merged;
}

function parseContents(contents: string, absolute: string): unknown {
  const ext = extname(absolute).toLowerCase();
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return loadYaml(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        break;
    }
  } catch (error) {
    throw new ConfigError(`Failed to parse ${absolute}: ${error instanceof Error ? error.message : String(error)}`);
  }
  throw new ConfigError(`Unsupported config format for ${absolute}`);
}

export async function loadConfig(path: string, profile?: string): Promise<DenyGuardConfig> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  const config = parseConfig(parseContents(contents, absolute), absolute);
  return profile ? applyProfile(config, profile) : config;
}
