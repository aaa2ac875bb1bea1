import type { ProfileOverrides } from '@logscrub/core';

/** Profile flags shared by `redact` and `engine`, as commander hands them over. */
export interface OverrideOptions {
  entropyThreshold?: string;
  entropyMinLength?: string;
  disableEntropy?: boolean;
  keysToRedact?: string;
}

/**
 * Turn the override flags into `ProfileOverrides`. Problems are pushed onto
 * `errors`; nothing set means `undefined`.
 */
export function parseOverrides(options: OverrideOptions, errors: string[]): ProfileOverrides | undefined {
  const overrides: ProfileOverrides = {};
  const entropy: NonNullable<ProfileOverrides['entropy']> = {};

  if (options.disableEntropy) entropy.enabled = false;

  if (options.entropyThreshold !== undefined) {
    const threshold = Number(options.entropyThreshold);
    if (options.entropyThreshold.trim() === '' || !Number.isFinite(threshold) || threshold <= 0) {
      errors.push(`Invalid entropy threshold: ${options.entropyThreshold}. Must be a positive number`);
    } else {
      entropy.threshold = threshold;
    }
  }

  if (options.entropyMinLength !== undefined) {
    const minLength = Number(options.entropyMinLength);
    if (!Number.isInteger(minLength) || minLength < 1) {
      errors.push(`Invalid entropy min length: ${options.entropyMinLength}. Must be a positive integer`);
    } else {
      entropy.minLength = minLength;
    }
  }

  if (Object.keys(entropy).length > 0) overrides.entropy = entropy;

  if (options.keysToRedact !== undefined) {
    const keyPaths = options.keysToRedact
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p !== '');
    if (keyPaths.length === 0) {
      errors.push(`Invalid key paths: "${options.keysToRedact}". Expected a comma-separated list`);
    } else {
      overrides.keyPaths = keyPaths;
    }
  }

  return Object.keys(overrides).length > 0 ? overrides : undefined;
}
