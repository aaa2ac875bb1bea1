import { ProfileValidationError } from '../errors.js';
import type { EntropyConfig } from '../entropy.js';
import { parseTemplate, type PatternRule } from '../rules.js';
import {
  DEFAULT_ENTROPY,
  DEFAULT_KEY_PATH_REPLACEMENT,
  type KeyPathAction,
  type KeyPathRule,
  type Profile,
  type ProfileLintResult,
} from './types.js';

const KNOWN_KEYS = new Set([
  'name',
  'description',
  'extends',
  'patterns',
  'entropy',
  'key_paths',
  'filename_patterns',
]);
const KNOWN_PATTERN_KEYS = new Set(['name', 'pattern', 'replacement', 'enabled', 'description', 'flags']);
const KEY_PATH_ACTIONS = new Set<string>(['redact', 'mask', 'remove']);
const ALLOWED_FLAGS = new Set(['i', 'm', 's', 'u']);
const INLINE_FLAGS_RE = /^\(\?([ims]+)\)/;
const INDEX_RE = /\[(?:\d+|\*)?\]/g;

interface ProfileCheck {
  errors: string[];
  warnings: string[];
  profile?: Profile;
}

/**
 * Lint a profile document after `extends` has been resolved. Every problem is
 * collected; nothing stops at the first error.
 */
export function validateProfile(value: unknown): ProfileLintResult {
  const { errors, warnings } = checkProfile(value, 0);
  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Turn a profile document into an immutable {@link Profile}. Matchers are
 * compiled here and nowhere else.
 */
export function compileProfile(value: unknown, options: { revision?: number } = {}): Profile {
  const check = checkProfile(value, options.revision ?? 0);
  if (!check.profile) {
    const name = isPlainObject(value) && typeof value.name === 'string' ? value.name : undefined;
    throw new ProfileValidationError(check.errors, name);
  }
  return check.profile;
}

function checkProfile(value: unknown, revision: number): ProfileCheck {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isPlainObject(value)) {
    return { errors: ['Profile must be an object'], warnings };
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_KEYS.has(key)) warnings.push(`unknown field "${key}" is ignored`);
  }

  const name = value.name;
  if (typeof name !== 'string' || name.trim() === '') {
    errors.push('name must be a non-empty string');
  }

  const description = value.description;
  if (description !== undefined && typeof description !== 'string') {
    errors.push('description must be a string');
  }

  const rules = checkPatterns(value.patterns, errors, warnings);
  const entropy = checkEntropy(value.entropy, errors);
  const keyPaths = checkKeyPaths(value.key_paths, errors, warnings);
  const filenamePatterns = checkStringList(value.filename_patterns, 'filename_patterns', errors);

  if (errors.length > 0 || typeof name !== 'string') {
    return { errors, warnings };
  }

  const profile: Profile = {
    name,
    ...(typeof description === 'string' ? { description } : {}),
    rules,
    entropy,
    keyPaths,
    filenamePatterns,
    revision,
  };
  return { errors, warnings, profile: deepFreeze(profile) };
}

function checkPatterns(value: unknown, errors: string[], warnings: string[]): PatternRule[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push('patterns must be an array');
    return [];
  }

  const rules: PatternRule[] = [];
  const seen = new Set<string>();

  value.forEach((entry: unknown, i) => {
    const base = `patterns[${i}]`;
    if (!isPlainObject(entry)) {
      errors.push(`${base} must be an object`);
      return;
    }

    for (const key of Object.keys(entry)) {
      if (!KNOWN_PATTERN_KEYS.has(key)) warnings.push(`${base}: unknown field "${key}" is ignored`);
    }

    const id = entry.name;
    if (typeof id !== 'string' || id.trim() === '') {
      errors.push(`${base}.name must be a non-empty string`);
      return;
    }
    if (seen.has(id)) {
      errors.push(`${base}.name duplicate rule id: ${id}`);
    } else {
      seen.add(id);
    }

    const enabled = entry.enabled ?? true;
    if (typeof enabled !== 'boolean') {
      errors.push(`${base}.enabled must be a boolean`);
    }

    const ruleDescription = entry.description;
    if (ruleDescription !== undefined && typeof ruleDescription !== 'string') {
      errors.push(`${base}.description must be a string`);
    }

    const replacement = entry.replacement;
    if (typeof replacement !== 'string') {
      errors.push(`${base}.replacement must be a string`);
    }

    const matcher = compileMatcher(entry.pattern, entry.flags, `${base} (${id})`, errors);
    if (!matcher || typeof replacement !== 'string' || typeof enabled !== 'boolean') return;

    if (matcher.test('')) {
      warnings.push(`${base} (${id}): pattern can match empty text; empty matches are skipped`);
    }
    matcher.lastIndex = 0;

    const template = parseTemplate(replacement, matcher);
    if (!template.ok) {
      errors.push(`${base} (${id}): invalid replacement: ${template.error}`);
      return;
    }

    rules.push({
      id,
      matcher,
      replacement,
      template: template.parts,
      enabled,
      priority: i,
      ...(typeof ruleDescription === 'string' ? { description: ruleDescription } : {}),
    });
  });

  return rules;
}

function compileMatcher(pattern: unknown, flags: unknown, label: string, errors: string[]): RegExp | null {
  if (typeof pattern !== 'string' || pattern === '') {
    errors.push(`${label}: pattern must be a non-empty string`);
    return null;
  }
  if (flags !== undefined && typeof flags !== 'string') {
    errors.push(`${label}: flags must be a string`);
    return null;
  }

  const flagSet = new Set<string>();
  for (const flag of flags ?? '') {
    if (flag === 'g') continue;
    if (!ALLOWED_FLAGS.has(flag)) {
      errors.push(`${label}: unsupported regex flag "${flag}"`);
      return null;
    }
    flagSet.add(flag);
  }

  // Profiles written for other regex dialects often start with `(?i)`.
  let source = pattern;
  const inline = INLINE_FLAGS_RE.exec(source);
  if (inline) {
    for (const flag of inline[1] ?? '') flagSet.add(flag);
    source = source.slice(inline[0].length);
  }

  try {
    return new RegExp(source, `g${[...flagSet].sort().join('')}`);
  } catch (err) {
    errors.push(`${label}: invalid pattern: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

function checkEntropy(value: unknown, errors: string[]): EntropyConfig {
  if (value === undefined || value === null) return { ...DEFAULT_ENTROPY };
  if (!isPlainObject(value)) {
    errors.push('entropy must be an object');
    return { ...DEFAULT_ENTROPY };
  }

  const enabled = value.enabled ?? DEFAULT_ENTROPY.enabled;
  if (typeof enabled !== 'boolean') {
    errors.push('entropy.enabled must be a boolean');
  }

  const threshold = value.threshold ?? DEFAULT_ENTROPY.threshold;
  if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold <= 0) {
    errors.push(`entropy.threshold must be a positive number (got: ${String(threshold)})`);
  }

  const minLength = value.min_length ?? DEFAULT_ENTROPY.minLength;
  if (typeof minLength !== 'number' || !Number.isInteger(minLength) || minLength <= 0) {
    errors.push(`entropy.min_length must be a positive integer (got: ${String(minLength)})`);
  }

  return {
    enabled: typeof enabled === 'boolean' ? enabled : DEFAULT_ENTROPY.enabled,
    threshold: typeof threshold === 'number' ? threshold : DEFAULT_ENTROPY.threshold,
    minLength: typeof minLength === 'number' ? minLength : DEFAULT_ENTROPY.minLength,
  };
}

function checkKeyPaths(value: unknown, errors: string[], warnings: string[]): KeyPathRule[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push('key_paths must be an array');
    return [];
  }

  const rules: KeyPathRule[] = [];
  const seen = new Set<string>();

  value.forEach((entry: unknown, i) => {
    const base = `key_paths[${i}]`;
    const doc = typeof entry === 'string' ? { path: entry } : entry;
    if (!isPlainObject(doc)) {
      errors.push(`${base} must be a string or an object`);
      return;
    }

    const path = doc.path;
    if (typeof path !== 'string' || path.trim() === '') {
      errors.push(`${base}.path must be a non-empty string`);
      return;
    }
    const segments = path.replace(INDEX_RE, '').split('.');
    if (segments.some((s) => s === '')) {
      errors.push(`${base}.path has an empty segment: ${path}`);
      return;
    }

    const action = doc.action ?? 'redact';
    if (typeof action !== 'string' || !isKeyPathAction(action)) {
      errors.push(`${base}.action must be one of redact, mask, remove (got: ${String(action)})`);
      return;
    }

    const replacement = doc.replacement ?? DEFAULT_KEY_PATH_REPLACEMENT;
    if (typeof replacement !== 'string') {
      errors.push(`${base}.replacement must be a string`);
      return;
    }
    if (doc.replacement !== undefined && action !== 'redact') {
      warnings.push(`${base}: replacement is ignored for action "${action}"`);
    }

    const key = segments.join('.');
    if (seen.has(key)) {
      warnings.push(`${base}: duplicate key path ${path}; the first rule wins`);
    }
    seen.add(key);

    rules.push({ path, segments, action, replacement });
  });

  return rules;
}

function checkStringList(value: unknown, field: string, errors: string[]): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array`);
    return [];
  }
  const out: string[] = [];
  value.forEach((entry: unknown, i) => {
    if (typeof entry !== 'string' || entry === '') {
      errors.push(`${field}[${i}] must be a non-empty string`);
    } else {
      out.push(entry);
    }
  });
  return out;
}

function isKeyPathAction(value: string): value is KeyPathAction {
  return KEY_PATH_ACTIONS.has(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || value instanceof RegExp) return value;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
