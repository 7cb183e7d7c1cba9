#!/usr/bin/env tsx
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { loadConfig } from '../../src/config';
import { BenchmarkSample, generatePayload, seededRandom } from '../../src/bench';

const DEFAULT_COUNT = 200;
const DEFAULT_SEED = 1234;

async function main() {
  const [configPath, output = 'data/samples.json', count = String(DEFAULT_COUNT), seed = String(DEFAULT_SEED)] =
    process.argv.slice(2);
  if (!configPath) {
    process.stderr.write('Usage: tsx scripts/datasets/generate-samples.ts <config> [output] [count] [seed]\n');
    process.exit(1);
  }

  const config = await loadConfig(configPath);
  const words = config.lists.flatMap((list) => list.words.map((word) => word.trim())).filter((word) => word.length > 0);
  const random = seededRandom(Number(seed));
  const samples: BenchmarkSample[] = Array.from({ length: Number(count) }, (_, index) => {
    const generated = generatePayload(random, { words, plantRate: 0.4 });
    return generated.planted
      ? { name: `sample-${index}`, payload: generated.payload, expectBlock: true }
      : { name: `sample-${index}`, payload: generated.payload };
  });

  const target = resolve(output);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify({ samples }, null, 2)}\n`, 'utf8');
  process.stdout.write(`Generated ${samples.length} benchmark samples in ${target}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`Sample generation failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
