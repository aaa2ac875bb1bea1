import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { load as loadYaml, JSON_SCHEMA } from 'js-yaml';

import type { EntropyConfig } from '../entropy.js';
import { ProfileLoadError } from '../errors.js';
import type { Profile } from './types.js';
import { compileProfile, isPlainObject } from './validator.js';

export interface ProfileLoadOptions {
  /** Directory `extends` paths are resolved against. Defaults to the cwd. */
  basePath?: string;
  /** Where the built-in profiles live. */
  profilesDir?: string;
  /** Revision stamped on the compiled profile. */
  revision?: number;
  /** Applied on top of the resolved document before it is compiled. */
  overrides?: ProfileOverrides;
}

/** Command-line adjustments to a loaded profile. */
export interface ProfileOverrides {
  entropy?: Partial<EntropyConfig>;
  /** Appended to the profile's own key paths, with the default action. */
  keyPaths?: string[];
}

export const BUILTIN_PROFILES: readonly string[] = ['default', 'nginx', 'docker', 'cloudtrail', 'application'];

const BUILTIN_PREFIX = 'builtin:';
const DEFAULT_PROFILES_DIR = fileURLToPath(new URL('../../profiles/', import.meta.url));

interface ResolveContext {
  profilesDir: string;
  visited: Set<string>;
}

export function builtinProfilesDir(): string {
  return DEFAULT_PROFILES_DIR;
}

export function isBuiltinRef(ref: string): boolean {
  const id = ref.startsWith(BUILTIN_PREFIX) ? ref.slice(BUILTIN_PREFIX.length) : ref;
  return BUILTIN_PROFILES.includes(id);
}

/**
 * Load and compile a profile from a built-in name (`nginx`, `builtin:nginx`)
 * or a YAML/JSON file path.
 */
export function loadProfile(ref: string, options: ProfileLoadOptions = {}): Profile {
  const doc = loadProfileDocument(ref, options);
  const effective = options.overrides ? applyProfileOverrides(doc, options.overrides) : doc;
  return compileProfile(effective, { revision: options.revision });
}

/**
 * Merge overrides into a resolved profile document the way a child profile
 * would: entropy fields replace the base's one by one, key paths append.
 */
export function applyProfileOverrides(
  doc: Record<string, unknown>,
  overrides: ProfileOverrides,
): Record<string, unknown> {
  const child: Record<string, unknown> = {};

  const { enabled, threshold, minLength } = overrides.entropy ?? {};
  const entropy: Record<string, unknown> = {};
  if (enabled !== undefined) entropy.enabled = enabled;
  if (threshold !== undefined) entropy.threshold = threshold;
  if (minLength !== undefined) entropy.min_length = minLength;
  if (Object.keys(entropy).length > 0) child.entropy = entropy;

  if (overrides.keyPaths && overrides.keyPaths.length > 0) {
    child.key_paths = [...overrides.keyPaths];
  }

  return mergeProfiles(doc, child);
}

export function loadProfileFromString(content: string, options: ProfileLoadOptions = {}): Profile {
  const doc = resolveProfileSource(content, options.basePath ?? process.cwd(), '<string>', {
    profilesDir: options.profilesDir ?? DEFAULT_PROFILES_DIR,
    visited: new Set(),
  });
  return compileProfile(doc, { revision: options.revision });
}

/**
 * Read a profile document and resolve its `extends` chain, without
 * validating it. Used by `profile show` and `profile lint`.
 */
export function loadProfileDocument(ref: string, options: ProfileLoadOptions = {}): Record<string, unknown> {
  return resolveRef(ref, options.basePath ?? process.cwd(), {
    profilesDir: options.profilesDir ?? DEFAULT_PROFILES_DIR,
    visited: new Set(),
  });
}

/**
 * Every file the profile is built from, the profile itself first and then
 * each base reached through `extends`.
 */
export function resolveProfileChain(ref: string, options: ProfileLoadOptions = {}): string[] {
  const ctx: ResolveContext = {
    profilesDir: options.profilesDir ?? DEFAULT_PROFILES_DIR,
    visited: new Set(),
  };
  resolveRef(ref, options.basePath ?? process.cwd(), ctx);
  return [...ctx.visited];
}

/** Absolute path of the file a profile ref points at. */
export function resolveProfilePath(ref: string, options: ProfileLoadOptions = {}): string {
  if (isBuiltinRef(ref)) {
    const id = ref.startsWith(BUILTIN_PREFIX) ? ref.slice(BUILTIN_PREFIX.length) : ref;
    return path.join(options.profilesDir ?? DEFAULT_PROFILES_DIR, `${id}.yaml`);
  }
  return path.resolve(options.basePath ?? process.cwd(), ref);
}

function resolveRef(ref: string, basePath: string, ctx: ResolveContext): Record<string, unknown> {
  const filePath = resolveProfilePath(ref, { basePath, profilesDir: ctx.profilesDir });
  if (ctx.visited.has(filePath)) {
    throw new ProfileLoadError(`Circular profile extension detected: ${ref}`);
  }
  ctx.visited.add(filePath);

  if (!fs.existsSync(filePath)) {
    throw new ProfileLoadError(`Unknown profile or file not found: ${ref}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ProfileLoadError(`Failed to read profile ${filePath}`, { cause: err });
  }
  return resolveProfileSource(content, path.dirname(filePath), filePath, ctx);
}

function resolveProfileSource(
  content: string,
  basePath: string,
  label: string,
  ctx: ResolveContext,
): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = loadYaml(content, { schema: JSON_SCHEMA, filename: label });
  } catch (err) {
    throw new ProfileLoadError(`Failed to parse profile ${label}`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ProfileLoadError(`Profile ${label} must be an object`);
  }

  const baseRef = parsed.extends;
  if (baseRef === undefined) return parsed;
  if (typeof baseRef !== 'string' || baseRef.trim() === '') {
    throw new ProfileLoadError(`Profile ${label}: extends must be a non-empty string`);
  }

  const base = resolveRef(baseRef, basePath, ctx);
  const merged = mergeProfiles(base, parsed);
  delete merged.extends;
  return merged;
}

/**
 * Child fields override the base. Patterns with the same name replace the
 * base rule in place; new ones are appended. Key paths and filename patterns
 * are concatenated.
 */
export function mergeProfiles(base: Record<string, unknown>, child: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base, ...child };

  if (isPlainObject(base.entropy) && isPlainObject(child.entropy)) {
    out.entropy = { ...base.entropy, ...child.entropy };
  }

  out.patterns = mergePatterns(base.patterns, child.patterns);
  out.key_paths = concatLists(base.key_paths, child.key_paths);
  out.filename_patterns = concatLists(base.filename_patterns, child.filename_patterns);

  for (const key of ['patterns', 'key_paths', 'filename_patterns']) {
    if (out[key] === undefined) delete out[key];
  }
  return out;
}

function mergePatterns(base: unknown, child: unknown): unknown {
  if (child === undefined || (Array.isArray(child) && child.length === 0)) return base;
  if (!Array.isArray(child) || !Array.isArray(base) || base.length === 0) return child;

  const childRules: unknown[] = child;
  const out: unknown[] = [...base];
  const index = new Map<string, number>();
  out.forEach((rule, i) => {
    if (isPlainObject(rule) && typeof rule.name === 'string') index.set(rule.name, i);
  });

  for (const rule of childRules) {
    const name = isPlainObject(rule) && typeof rule.name === 'string' ? rule.name : undefined;
    const at = name === undefined ? undefined : index.get(name);
    if (at !== undefined) {
      out[at] = rule;
    } else {
      if (name !== undefined) index.set(name, out.length);
      out.push(rule);
    }
  }
  return out;
}

function concatLists(base: unknown, child: unknown): unknown {
  if (child === undefined) return base;
  if (!Array.isArray(child) || !Array.isArray(base)) return child;
  return [...base, ...child];
}
