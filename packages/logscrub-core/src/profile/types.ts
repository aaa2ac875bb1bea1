import type { EntropyConfig } from '../entropy.js';
import type { PatternRule } from '../rules.js';

// --- Profile documents, as written on disk (YAML or JSON) ---

export interface PatternRuleDocument {
  name: string;
  pattern: string;
  replacement: string;
  enabled?: boolean;
  description?: string;
  /** Extra RegExp flags; `g` is always added. */
  flags?: string;
}

export interface EntropyDocument {
  enabled?: boolean;
  threshold?: number;
  min_length?: number;
}

export type KeyPathAction = 'redact' | 'mask' | 'remove';

export interface KeyPathDocument {
  path: string;
  action?: KeyPathAction;
  replacement?: string;
}

export interface ProfileDocument {
  name?: string;
  description?: string;
  /** Built-in profile name or a path relative to this document. */
  extends?: string;
  patterns?: PatternRuleDocument[];
  entropy?: EntropyDocument;
  key_paths?: Array<string | KeyPathDocument>;
  filename_patterns?: string[];
}

// --- Compiled profile ---

export interface KeyPathRule {
  readonly path: string;
  readonly segments: readonly string[];
  readonly action: KeyPathAction;
  readonly replacement: string;
}

export interface Profile {
  readonly name: string;
  readonly description?: string;
  /** Ordered by priority. Disabled rules stay listed but never match. */
  readonly rules: readonly PatternRule[];
  readonly entropy: Readonly<EntropyConfig>;
  readonly keyPaths: readonly KeyPathRule[];
  readonly filenamePatterns: readonly string[];
  /** Bumped by the profile store on every successful load or reload. */
  readonly revision: number;
}

export interface ProfileLintResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_ENTROPY: Readonly<EntropyConfig> = Object.freeze({
  enabled: true,
  threshold: 4.5,
  minLength: 20,
});

export const DEFAULT_KEY_PATH_REPLACEMENT = '[REDACTED]';
