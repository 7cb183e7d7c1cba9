import { performance } from 'node:perf_hooks';
import { errorMessage, PayloadTypeError, ScanFailureCode } from '../common/errors';
import { getLogger } from '../common/logger';
import { recordCheckMetrics } from '../observability';
import type { MatchOutcome } from '../scanner';
import { checkValue, describeOutcome } from './facade';
import { MatcherHandle, MatcherStore } from './store';

export const DEFAULT_PLUGIN_NAME = 'DenyListPlugin';

export type ViolationCode = 'DENY_LIST_VIOLATION' | 'DENY_LIST_SCAN_FAILED';

export type ViolationCause = 'deny_word' | ScanFailureCode | 'invalid_payload' | 'internal_error';

export interface HookViolation {
  reason: string;
  description: string;
  code: ViolationCode;
  pluginName: string;
  details: {
    cause: ViolationCause;
    listName?: string;
    locationHint?: string;
    word?: string;
  };
}

export interface HookResult {
  continueProcessing: boolean;
  violation?: HookViolation;
  metadata: {
    matcherVersion?: number;
    backend?: string;
  };
}

export interface PreFetchOptions {
  pluginName?: string;
  /** Expose the literal deny word in the violation. */
  revealWord?: boolean;
}

function violationFor(outcome: MatchOutcome, options: Required<PreFetchOptions>): HookViolation | undefined {
  if (!outcome.matched) {
    return undefined;
  }
  const reason = describeOutcome(outcome, { revealWord: options.revealWord });
  if (outcome.reason === 'deny_word') {
    return {
      reason,
      description: 'The prompt contains words from the deny list',
      code: 'DENY_LIST_VIOLATION',
      pluginName: options.pluginName,
      details: {
        cause: outcome.reason,
        listName: outcome.listName,
        locationHint: outcome.locationHint,
        ...(options.revealWord ? { word: outcome.word } : {}),
      },
    };
  }
  return {
    reason,
    description: 'The prompt could not be scanned within the configured limits',
    code: 'DENY_LIST_SCAN_FAILED',
    pluginName: options.pluginName,
    details: { cause: outcome.reason, locationHint: outcome.locationHint },
  };
}

function failedScan(cause: ViolationCause, pluginName: string, locationHint?: string): HookViolation {
  return {
    reason: `prompt rejected: ${cause === 'invalid_payload' ? 'payload has an unsupported shape' : 'deny check failed'}`,
    description: 'The prompt could not be checked against the deny list',
    code: 'DENY_LIST_SCAN_FAILED',
    pluginName,
    details: locationHint ? { cause, locationHint } : { cause },
  };
}

/**
 * Pre-processing check for a request's arguments. Allows only when the active
 * matcher finds nothing; every failure, including a missing matcher, rejects.
 */
export function promptPreFetch(args: unknown, store: MatcherStore, options: PreFetchOptions = {}): HookResult {
  const log = getLogger('hook');
  const resolved: Required<PreFetchOptions> = {
    pluginName: options.pluginName ?? DEFAULT_PLUGIN_NAME,
    revealWord: options.revealWord ?? false,
  };
  const started = performance.now();
  const handle: MatcherHandle | undefined = store.tryCurrent();
  const metadata = { matcherVersion: handle?.version, backend: handle?.compiled.backend };
  const backend = handle?.compiled.backend ?? 'none';

  let violation: HookViolation | undefined;
  try {
    if (!handle) {
      throw new Error('No deny matcher has been loaded');
    }
    const outcome = checkValue(args, handle.compiled, handle.scanOptions);
    violation = violationFor(outcome, resolved);
    if (outcome.matched) {
      log.warn(describeOutcome(outcome), {
        listName: outcome.reason === 'deny_word' ? outcome.listName : undefined,
        word: outcome.word,
        location: outcome.locationHint,
      });
    }
  } catch (error) {
    if (error instanceof PayloadTypeError) {
      violation = failedScan('invalid_payload', resolved.pluginName, error.locationHint);
      log.warn(`Rejected malformed payload: ${error.message}`);
    } else {
      violation = failedScan('internal_error', resolved.pluginName);
      log.error(`Deny check failed closed: ${errorMessage(error)}`);
    }
  }

  recordCheckMetrics({
    verdict: violation ? 'reject' : 'allow',
    reason: violation ? violation.details.cause : 'none',
    backend,
    durationMs: performance.now() - started,
  });

  return violation ? { continueProcessing: false, violation, metadata } : { continueProcessing: true, metadata };
}
