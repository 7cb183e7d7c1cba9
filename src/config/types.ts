import type { BackendKind, DenyWordList, EmptyPolicy } from '../compiler';

export interface LimitsConfig {
  maxDepth?: number;
  maxBytes?: number;
  maxPatterns?: number;
}

export interface ServerConfig {
  host?: string;
  port?: number;
}

export interface DenyGuardConfig {
  backend: BackendKind;
  emptyPolicy: EmptyPolicy;
  lists: DenyWordList[];
  limits: LimitsConfig;
  /** Keep matched words out of hook results unless explicitly requested. */
  redactWords: boolean;
  pluginName?: string;
  server?: ServerConfig;
  profiles?: Record<string, DenyGuardProfile>;
}

export type DenyGuardProfile = Partial<Omit<DenyGuardConfig, 'profiles'>>;
