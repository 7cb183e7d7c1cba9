import { errorMessage } from '../common/errors';
import { getLogger } from '../common/logger';
import { BackendKind, compile, CompiledMatcher, CompileOptions, DenyWordList } from '../compiler';
import { recordCompileMetrics, withSpanSync } from '../observability';
import type { ScanOptions } from '../scanner';

/**
 * One immutable matcher version together with the scan limits it was loaded
 * with. A check reads the handle once and uses it for the whole call.
 */
export interface MatcherHandle {
  readonly version: number;
  readonly compiled: CompiledMatcher;
  readonly scanOptions: Readonly<ScanOptions>;
  readonly loadedAt: string;
}

export interface ReloadOptions extends CompileOptions {
  backend?: BackendKind;
  scanOptions?: ScanOptions;
}

/**
 * Holder of the active matcher. Replacing it is a single reference assignment,
 * so callers see either the old handle or the new one, never a mix. Old
 * handles are never mutated and are released by the garbage collector once
 * the last in-flight check drops them.
 */
export class MatcherStore {
  private handle: MatcherHandle | undefined;
  private nextVersion = 1;

  constructor(initial?: { compiled: CompiledMatcher; scanOptions?: ScanOptions }) {
    if (initial) {
      this.replace(initial.compiled, initial.scanOptions);
    }
  }

  isReady(): boolean {
    return this.handle !== undefined;
  }

  tryCurrent(): MatcherHandle | undefined {
    return this.handle;
  }

  current(): MatcherHandle {
    if (!this.handle) {
      throw new Error('No deny matcher has been loaded');
    }
    return this.handle;
  }

  replace(compiled: CompiledMatcher, scanOptions: ScanOptions = {}): MatcherHandle {
    const handle: MatcherHandle = Object.freeze({
      version: this.nextVersion,
      compiled,
      scanOptions: Object.freeze({ ...scanOptions }),
      loadedAt: new Date().toISOString(),
    });
    this.nextVersion += 1;
    this.handle = handle;
    return handle;
  }

  /**
   * Compiles `lists` and swaps the result in. On failure the previous matcher
   * keeps serving and the error is rethrown to the caller.
   */
  reload(lists: readonly DenyWordList[], options: ReloadOptions = {}): MatcherHandle {
    const log = getLogger('store');
    const backend = options.backend ?? 'automaton';
    let compiled: CompiledMatcher;
    try {
      compiled = withSpanSync(
        'deny-guard.compile',
        { 'deny_guard.backend': backend, 'deny_guard.lists': lists.length },
        () => compile(lists, backend, { maxPatterns: options.maxPatterns, emptyPolicy: options.emptyPolicy }),
      );
    } catch (error) {
      recordCompileMetrics({ backend, success: false });
      log.error(`Deny list compilation failed: ${errorMessage(error)}`, {
        keptVersion: this.handle?.version,
      });
      throw error;
    }

    const handle = this.replace(compiled, options.scanOptions);
    recordCompileMetrics({
      backend,
      success: true,
      patterns: compiled.patterns.length,
      warnings: compiled.warningCount,
      version: handle.version,
    });
    log.info(`Loaded deny matcher v${handle.version}`, {
      backend,
      patterns: compiled.patterns.length,
      warnings: compiled.warningCount,
    });
    return handle;
  }
}
