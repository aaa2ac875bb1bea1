/**
 * Structured-path redaction for parsed JSON/YAML documents.
 *
 * A node's path is the dot-joined list of object keys from the root. Array
 * indices are walked but never matched, so `users.email` covers the `email`
 * field of every element of `users`. Traces use the concrete location
 * (`users[0].email`).
 */

import type { KeyPathRule } from './profile/types.js';
import type { JsonValue } from './types.js';

export interface PathRedaction {
  /** Concrete location, e.g. `users[0].email`. */
  location: string;
  /** The configured path of the rule that fired. */
  rule: string;
  original: string;
  redacted: string;
}

export interface RedactPathsOptions {
  /**
   * Called for every string leaf no rule covers; its return value replaces
   * the leaf.
   */
  onLeaf?: (text: string, location: string) => string;
  /** Called as each key path redaction is made, in document order. */
  onRedaction?: (redaction: PathRedaction) => void;
}

export interface RedactPathsResult {
  value: JsonValue;
  redactions: PathRedaction[];
}

export const REMOVED_MARKER = '[REMOVED]';

/** Returns a new tree; `tree` is left untouched. */
export function redactPaths(
  tree: JsonValue,
  rules: readonly KeyPathRule[],
  options: RedactPathsOptions = {},
): RedactPathsResult {
  const redactions: PathRedaction[] = [];
  const record = (redaction: PathRedaction): void => {
    redactions.push(redaction);
    options.onRedaction?.(redaction);
  };

  const walk = (node: JsonValue, keys: readonly string[], location: string): JsonValue => {
    if (Array.isArray(node)) {
      return node.map((item, i) => walk(item, keys, `${location}[${i}]`));
    }

    if (node !== null && typeof node === 'object') {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, value] of Object.entries(node)) {
        const childKeys = [...keys, key];
        const childLocation = location ? `${location}.${key}` : key;
        const rule = findRule(rules, childKeys);

        if (!rule) {
          setOwn(out, key, walk(value, childKeys, childLocation));
          continue;
        }

        const original = stringifyValue(value);
        switch (rule.action) {
          case 'remove':
            record({ location: childLocation, rule: rule.path, original, redacted: REMOVED_MARKER });
            break;
          case 'mask': {
            const masked = maskValue(original);
            if (masked !== original || typeof value !== 'string') {
              record({ location: childLocation, rule: rule.path, original, redacted: masked });
            }
            setOwn(out, key, masked);
            break;
          }
          case 'redact':
            if (value !== rule.replacement) {
              record({ location: childLocation, rule: rule.path, original, redacted: rule.replacement });
            }
            setOwn(out, key, rule.replacement);
            break;
        }
      }
      return out;
    }

    if (typeof node === 'string' && options.onLeaf) {
      return options.onLeaf(node, location);
    }
    return node;
  };

  return { value: walk(tree, [], ''), redactions };
}

/** First rule whose segments equal `keys`; `*` matches any single key. */
export function findRule(rules: readonly KeyPathRule[], keys: readonly string[]): KeyPathRule | undefined {
  return rules.find(
    (rule) =>
      rule.segments.length === keys.length &&
      rule.segments.every((segment, i) => segment === '*' || segment === keys[i]),
  );
}

/** Keep the first and last two characters; shorter values keep less. */
export function maskValue(value: string): string {
  const chars = Array.from(value);
  const n = chars.length;
  if (n <= 2) return '*'.repeat(n);
  if (n <= 4) return `${chars[0]}${'*'.repeat(n - 2)}${chars[n - 1]}`;
  return `${chars.slice(0, 2).join('')}${'*'.repeat(n - 4)}${chars.slice(-2).join('')}`;
}

function stringifyValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// Plain assignment would treat a `__proto__` key as the prototype.
function setOwn(target: { [key: string]: JsonValue }, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
