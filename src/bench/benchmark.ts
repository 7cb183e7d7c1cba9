import { performance } from 'node:perf_hooks';
import { checkValue } from '../check/facade';
import { BackendKind, compile, CompileOptions, DenyWordList } from '../compiler';
import { BACKEND_KINDS } from '../matchers';
import type { MatchOutcome, ScanOptions } from '../scanner';

export interface BenchmarkSample {
  name: string;
  payload: unknown;
  /** Expected verdict, used for the accuracy figure. */
  expectBlock?: boolean;
}

export interface BenchmarkOptions {
  lists: readonly DenyWordList[];
  samples: readonly BenchmarkSample[];
  backends?: readonly BackendKind[];
  iterations?: number;
  warmup?: number;
  compileOptions?: CompileOptions;
  scanOptions?: ScanOptions;
  /** Milliseconds clock; defaults to `performance.now`. */
  clock?: () => number;
}

export interface BackendTiming {
  backend: BackendKind;
  patterns: number;
  compileMs: number;
  meanUs: number;
  minUs: number;
  maxUs: number;
  p95Us: number;
  /** Samples rejected by this backend. */
  rejected: number;
  /** Percentage of samples with `expectBlock` that got the expected verdict. */
  accuracy?: number;
}

export interface SampleVerdict {
  backend: BackendKind;
  matched: boolean;
  word: string | null;
}

export interface Disagreement {
  sample: string;
  verdicts: SampleVerdict[];
}

export interface BenchmarkReport {
  iterations: number;
  warmup: number;
  samples: number;
  results: BackendTiming[];
  disagreements: Disagreement[];
}

function percentile(sorted: readonly number[], fraction: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.min(sorted.length - 1, Math.ceil(fraction * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Compiles the lists once per backend, then times `iterations` checks of every
 * sample. Verdicts from the first timed pass are compared across backends.
 */
export function runBenchmark(options: BenchmarkOptions): BenchmarkReport {
  const backends = options.backends ?? BACKEND_KINDS;
  const iterations = options.iterations ?? 100;
  const warmup = options.warmup ?? 5;
  const clock = options.clock ?? (() => performance.now());
  const verdicts = new Map<string, SampleVerdict[]>();
  const results: BackendTiming[] = [];

  for (const backend of backends) {
    const compileStarted = clock();
    const compiled = compile(options.lists, backend, options.compileOptions);
    const compileMs = clock() - compileStarted;

    for (let pass = 0; pass < warmup; pass += 1) {
      for (const sample of options.samples) {
        checkValue(sample.payload, compiled, options.scanOptions);
      }
    }

    const durations: number[] = [];
    let rejected = 0;
    let expected = 0;
    let correct = 0;
    for (const sample of options.samples) {
      let first: MatchOutcome | undefined;
      for (let run = 0; run < iterations; run += 1) {
        const started = clock();
        const outcome = checkValue(sample.payload, compiled, options.scanOptions);
        durations.push((clock() - started) * 1000);
        first ??= outcome;
      }
      if (!first) {
        continue;
      }
      if (first.matched) {
        rejected += 1;
      }
      if (sample.expectBlock !== undefined) {
        expected += 1;
        if (sample.expectBlock === first.matched) {
          correct += 1;
        }
      }
      const list = verdicts.get(sample.name) ?? [];
      list.push({ backend, matched: first.matched, word: first.matched ? first.word : null });
      verdicts.set(sample.name, list);
    }

    const sorted = [...durations].sort((a, b) => a - b);
    const total = durations.reduce((sum, value) => sum + value, 0);
    results.push({
      backend,
      patterns: compiled.patterns.length,
      compileMs: round(compileMs),
      meanUs: round(durations.length > 0 ? total / durations.length : 0),
      minUs: round(sorted[0] ?? 0),
      maxUs: round(sorted[sorted.length - 1] ?? 0),
      p95Us: round(percentile(sorted, 0.95)),
      rejected,
      ...(expected > 0 ? { accuracy: round((correct / expected) * 100) } : {}),
    });
  }

  const disagreements: Disagreement[] = [];
  for (const [sample, list] of verdicts) {
    const [reference, ...rest] = list;
    if (rest.some((verdict) => verdict.matched !== reference.matched || verdict.word !== reference.word)) {
      disagreements.push({ sample, verdicts: list });
    }
  }

  return {
    iterations,
    warmup,
    samples: options.samples.length,
    results,
    disagreements,
  };
}
