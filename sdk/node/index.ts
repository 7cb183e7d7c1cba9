import type { HookResult } from '../../src/check/hook';

export interface DenyGuardClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

export interface ReadyStatus {
  status: 'ok' | 'starting';
  matcherVersion?: number;
  backend?: string;
  patterns?: number;
  loadedAt?: string;
}

export interface ReloadSummary {
  message: string;
  matcherVersion: number;
  backend: string;
  patterns: number;
  warnings: number;
  durationMs: number;
}

export class DenyGuardClient {
  constructor(private readonly options: DenyGuardClientOptions) {}

  async check(args: unknown): Promise<HookResult> {
    return this.request<HookResult>('/check', { method: 'POST', body: JSON.stringify({ args }) });
  }

  async ready(): Promise<ReadyStatus> {
    return this.request<ReadyStatus>('/ready', {}, [200, 503]);
  }

  async reload(): Promise<ReloadSummary> {
    return this.request<ReloadSummary>('/reload', { method: 'POST', body: '{}' });
  }

  private async request<T>(path: string, init: RequestInit, accepted: number[] = [200]): Promise<T> {
    const url = `${this.options.baseUrl}${path}`;
    const doFetch = this.options.fetch ?? fetch;
    const response = await doFetch(url, {
      ...init,
      headers: {
        'content-type': 'application/json',
        ...(this.options.headers ?? {}),
      },
    });
    if (!accepted.includes(response.status)) {
      const text = await response.text();
      throw new Error(`Request failed (${response.status}): ${text}`);
    }
    return (await response.json()) as T;
  }
}
