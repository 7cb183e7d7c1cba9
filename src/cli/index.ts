#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { FSWatcher, watch } from 'chokidar';
import { MatcherStore, promptPreFetch, ReloadOptions } from '../check';
import { compile } from '../compiler';
import { DenyGuardConfig, loadConfig, sampleConfig } from '../config';
import { configureLogger, errorMessage, getLogger, parseLogFormat, parseLogLevel } from '../common';
import { BACKEND_KINDS, BackendKind, isBackendKind } from '../matchers';
import { loadSamples, runBenchmark } from '../bench';
import { withSpan } from '../observability';
import { createServer } from '../api/server';

/** Exit code of `check` when the payload is rejected. */
export const REJECT_EXIT_CODE = 2;

interface ConfigOptions {
  config: string;
  profile?: string;
}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

async function loadConfigOrExit(path: string, profile?: string): Promise<DenyGuardConfig> {
  try {
    return await withSpan('deny-guard.config.load', { 'deny_guard.profile': profile }, () => loadConfig(path, profile));
  } catch (error) {
    getLogger('cli').error(`Failed to load config: ${errorMessage(error)}`);
    process.exit(1);
  }
}

export function reloadOptionsFor(config: DenyGuardConfig): ReloadOptions {
  return {
    backend: config.backend,
    emptyPolicy: config.emptyPolicy,
    maxPatterns: config.limits.maxPatterns,
    scanOptions: {
      maxDepth: config.limits.maxDepth,
      maxBytes: config.limits.maxBytes,
    },
  };
}

function applyRedaction(config: DenyGuardConfig): void {
  configureLogger({ redactKeys: config.redactWords ? ['word'] : [] });
}

function parseBackends(value: string | undefined): BackendKind[] {
  if (!value) {
    return [...BACKEND_KINDS];
  }
  return value.split(',').map((item) => {
    const backend = item.trim();
    if (!isBackendKind(backend)) {
      throw new Error(`Unsupported backend "${backend}". Use one of ${BACKEND_KINDS.join(',')}.`);
    }
    return backend;
  });
}

function parseCount(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding('utf8');
  let data = '';
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

async function readPayload(options: { payload?: string; text?: string }): Promise<unknown> {
  if (options.text !== undefined) {
    return options.text;
  }
  const raw = options.payload ? await readFile(resolve(options.payload), 'utf8') : await readStdin();
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Payload is not valid JSON: ${errorMessage(error)}`);
  }
}

export async function runCli(argv = process.argv) {
  const program = new Command();
  program.name('deny-guard').description('Deny-word filter for request payloads');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.DENY_GUARD_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.DENY_GUARD_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<{ logLevel?: string; logFormat?: string }>();
      try {
        const level = parseLogLevel(opts.logLevel);
        const format = parseLogFormat(opts.logFormat);
        configureLogger({ level, format, destination: process.stderr });
      } catch (error) {
        console.error(errorMessage(error));
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', 'deny-guard.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      const target = resolve(options.config);
      await ensureDir(target);
      try {
        await writeFile(target, sampleConfig(), { flag: 'wx' });
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          log.error(`Config file already exists at ${target}`);
          process.exit(1);
        }
        throw error;
      }
      log.info(`Created config at ${target}`);
    });

  program
    .command('validate')
    .description('Compile the configured deny lists and report the result')
    .requiredOption('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .action(async (options: ConfigOptions) => {
      const log = getLogger('cli:validate');
      const config = await loadConfigOrExit(options.config, options.profile);
      try {
        const compiled = compile(config.lists, config.backend, {
          maxPatterns: config.limits.maxPatterns,
          emptyPolicy: config.emptyPolicy,
        });
        const summary = {
          backend: compiled.backend,
          lists: compiled.listNames.length,
          patterns: compiled.patterns.length,
          duplicates: compiled.duplicateCount,
          warnings: compiled.warningCount,
        };
        process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
        for (const warning of compiled.warnings) {
          log.warn(warning.message);
        }
      } catch (error) {
        log.error(`Deny lists are invalid: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  program
    .command('check')
    .description('Check a JSON payload (file or stdin) or a single text against the deny lists')
    .requiredOption('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--payload <path>', 'JSON payload file; stdin when omitted')
    .option('--text <text>', 'Check a single string instead of a JSON payload')
    .option('--reveal-word', 'Include the matched deny word in the result')
    .action(async (options: ConfigOptions & { payload?: string; text?: string; revealWord?: boolean }) => {
      const log = getLogger('cli:check');
      const config = await loadConfigOrExit(options.config, options.profile);
      applyRedaction(config);
      const store = new MatcherStore();
      let args: unknown;
      try {
        store.reload(config.lists, reloadOptionsFor(config));
        args = await readPayload(options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
      const result = promptPreFetch(args, store, {
        pluginName: config.pluginName,
        revealWord: Boolean(options.revealWord),
      });
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      if (!result.continueProcessing) {
        process.exitCode = REJECT_EXIT_CODE;
      }
    });

  program
    .command('bench')
    .description('Time every backend over a set of sample payloads')
    .requiredOption('--config <path>', 'Config file path')
    .requiredOption('--samples <path>', 'JSON file with sample payloads')
    .option('--profile <name>', 'Config profile')
    .option('--iterations <n>', 'Timed runs per sample', '100')
    .option('--warmup <n>', 'Untimed passes before timing', '5')
    .option('--backends <list>', 'Comma separated backends to compare')
    .action(
      async (options: ConfigOptions & { samples: string; iterations?: string; warmup?: string; backends?: string }) => {
        const log = getLogger('cli:bench');
        const config = await loadConfigOrExit(options.config, options.profile);
        try {
          const samples = await loadSamples(options.samples);
          const report = runBenchmark({
            lists: config.lists,
            samples,
            backends: parseBackends(options.backends),
            iterations: parseCount(options.iterations, 100, 'iterations'),
            warmup: parseCount(options.warmup, 5, 'warmup'),
            compileOptions: { maxPatterns: config.limits.maxPatterns, emptyPolicy: config.emptyPolicy },
            scanOptions: reloadOptionsFor(config).scanOptions,
          });
          process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
          if (report.disagreements.length > 0) {
            log.warn(`Backends disagreed on ${report.disagreements.length} samples`);
          }
        } catch (error) {
          log.error(`Benchmark failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      },
    );

  program
    .command('serve')
    .description('Start the HTTP check service')
    .requiredOption('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--host <host>', 'Host override')
    .option('--port <number>', 'Port override')
    .option('--watch', 'Reload the deny lists when the config file changes')
    .action(async (options: ConfigOptions & { host?: string; port?: string; watch?: boolean }) => {
      const log = getLogger('cli:serve');
      const config = await loadConfigOrExit(options.config, options.profile);
      applyRedaction(config);
      const store = new MatcherStore();
      try {
        store.reload(config.lists, reloadOptionsFor(config));
      } catch (error) {
        log.error(`Initial deny list compilation failed: ${errorMessage(error)}`);
        process.exit(1);
      }

      const reload = async () => {
        const next = await withSpan('deny-guard.config.load', { 'deny_guard.profile': options.profile }, () =>
          loadConfig(options.config, options.profile),
        );
        return store.reload(next.lists, reloadOptionsFor(next));
      };

      const port = options.port ? parseCount(options.port, 0, 'port') : config.server?.port ?? 4100;
      const host = options.host ?? config.server?.host ?? '127.0.0.1';
      const server = createServer(store, {
        reload,
        pluginName: config.pluginName,
        revealWord: !config.redactWords,
      });
      await server.listen({ port, host });
      log.info(`Server listening on http://${host}:${port}`);

      let watcher: FSWatcher | undefined;
      if (options.watch) {
        watcher = watch(resolve(options.config), { ignoreInitial: true });
        watcher.on('change', () => {
          reload()
            .then((handle) => log.info(`Config change applied as matcher v${handle.version}`))
            .catch((error: unknown) => {
              log.error(`Reload after config change failed, keeping v${store.tryCurrent()?.version}: ${errorMessage(error)}`);
            });
        });
        log.info('Watching config for changes...');
      }

      const shutdown = async () => {
        if (watcher) {
          await watcher.close();
        }
        await server.close();
        process.exit(0);
      };
      const onSignal = () => {
        shutdown().catch((error: unknown) => {
          log.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        });
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
