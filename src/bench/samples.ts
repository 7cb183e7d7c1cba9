import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError } from '../common/errors';
import type { BenchmarkSample } from './benchmark';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSample(entry: unknown, index: number, source: string): BenchmarkSample {
  if (typeof entry === 'string') {
    return { name: `sample-${index}`, payload: entry };
  }
  if (!isRecord(entry) || !('payload' in entry)) {
    throw new ConfigError(`${source}: sample #${index} must be a string or an object with a payload`);
  }
  const sample: BenchmarkSample = {
    name: typeof entry.name === 'string' ? entry.name : `sample-${index}`,
    payload: entry.payload,
  };
  if (entry.expectBlock !== undefined) {
    if (typeof entry.expectBlock !== 'boolean') {
      throw new ConfigError(`${source}: sample #${index} expectBlock must be a boolean`);
    }
    sample.expectBlock = entry.expectBlock;
  }
  return sample;
}

/**
 * Accepts `{ "samples": [...] }`, `{ "sample_texts": [...] }` or a bare array.
 * Entries are plain strings or `{ name?, payload, expectBlock? }`.
 */
export function parseSamples(raw: unknown, source = 'samples'): BenchmarkSample[] {
  let entries: unknown = raw;
  if (isRecord(raw)) {
    entries = raw.samples ?? raw.sample_texts;
  }
  if (!Array.isArray(entries)) {
    throw new ConfigError(`${source} must contain a list of samples`);
  }
  return entries.map((entry: unknown, index) => toSample(entry, index, source));
}

export async function loadSamples(path: string): Promise<BenchmarkSample[]> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${absolute}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseSamples(raw, absolute);
}
