import Fastify, { FastifyInstance } from 'fastify';
import { performance } from 'node:perf_hooks';
import { CompileError, ConfigError, errorMessage } from '../common/errors';
import { getLogger } from '../common/logger';
import { MatcherHandle, MatcherStore, promptPreFetch } from '../check';
import { getMetricsSnapshot, metricsContentType, withSpan } from '../observability';

export interface ServerOptions {
  /** Re-reads the deny lists and swaps the matcher; enables `POST /reload`. */
  reload?: () => Promise<MatcherHandle>;
  pluginName?: string;
  revealWord?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createServer(store: MatcherStore, options: ServerOptions = {}): FastifyInstance {
  const log = getLogger('server');
  const app = Fastify({ logger: false });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/ready', async (request, reply) => {
    const handle = store.tryCurrent();
    if (!handle) {
      reply.status(503);
      return { status: 'starting' };
    }
    return {
      status: 'ok',
      matcherVersion: handle.version,
      backend: handle.compiled.backend,
      patterns: handle.compiled.patterns.length,
      loadedAt: handle.loadedAt,
    };
  });

  app.get('/metrics', async (request, reply) => {
    const metrics = await getMetricsSnapshot();
    reply.header('Content-Type', metricsContentType());
    reply.send(metrics);
  });

  app.post<{ Body: unknown }>('/check', async (request, reply) => {
    const body = request.body;
    if (!isRecord(body) || !('args' in body)) {
      reply.status(400);
      return { error: 'request body must be an object with an "args" field' };
    }
    return promptPreFetch(body.args, store, {
      pluginName: options.pluginName,
      revealWord: options.revealWord,
    });
  });

  app.post('/reload', async (request, reply) => {
    const { reload } = options;
    if (!reload) {
      reply.status(404);
      return { error: 'reload is not configured' };
    }
    const started = performance.now();
    try {
      const handle = await withSpan('deny-guard.reload.server', {}, reload);
      const durationMs = Math.round((performance.now() - started) * 100) / 100;
      log.info('Reload completed', { version: handle.version, durationMs });
      return {
        message: 'reload complete',
        matcherVersion: handle.version,
        backend: handle.compiled.backend,
        patterns: handle.compiled.patterns.length,
        warnings: handle.compiled.warningCount,
        durationMs,
      };
    } catch (error) {
      if (error instanceof CompileError || error instanceof ConfigError) {
        reply.status(409);
        return {
          error: errorMessage(error),
          code: error.code,
          matcherVersion: store.tryCurrent()?.version,
        };
      }
      throw error;
    }
  });

  return app;
}
