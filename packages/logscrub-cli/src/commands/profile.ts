import path from 'node:path';

import {
  BUILTIN_PROFILES,
  loadProfile,
  loadProfileDocument,
  matchProfileForFile,
  validateProfile,
  type Profile,
} from '@logscrub/core';

export const profileCommands = {
  async list(): Promise<void> {
    try {
      console.log('Built-in profiles:');
      for (const name of BUILTIN_PROFILES) {
        const profile = loadProfile(name);
        console.log(`   ${name.padEnd(12)} ${profile.description ?? ''}`.trimEnd());
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to list profiles: ${message}`);
      process.exit(1);
    }
  },

  async show(ref: string = 'default'): Promise<void> {
    try {
      const profile = loadProfile(ref);
      console.log(`Profile: ${profile.name}`);
      console.log(JSON.stringify(describeProfile(profile), null, 2));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to load profile: ${message}`);
      process.exit(1);
    }
  },

  async lint(file: string): Promise<void> {
    try {
      const doc = loadProfileDocument(path.resolve(file));
      const result = validateProfile(doc);

      if (result.valid) {
        console.log('Profile is valid');
        console.log(`   Name: ${typeof doc.name === 'string' ? doc.name : 'unnamed'}`);
        console.log(`   Patterns: ${Array.isArray(doc.patterns) ? doc.patterns.length : 0}`);
        console.log(`   Key paths: ${Array.isArray(doc.key_paths) ? doc.key_paths.length : 0}`);

        if (result.warnings.length > 0) {
          console.log('\nWarnings:');
          result.warnings.forEach((w) => console.log(`   - ${w}`));
        }
      } else {
        console.log('Profile validation failed:');
        result.errors.forEach((err) => console.log(`   - ${err}`));
        process.exit(1);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to read profile file: ${message}`);
      process.exit(1);
    }
  },

  async match(file: string): Promise<void> {
    try {
      const profiles = BUILTIN_PROFILES.map((name) => loadProfile(name));
      const matched = matchProfileForFile(file, profiles);
      console.log(matched ? matched.name : 'No built-in profile matches this file name');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to match profile: ${message}`);
      process.exit(1);
    }
  },
};

export function describeProfile(profile: Profile) {
  return {
    name: profile.name,
    ...(profile.description !== undefined ? { description: profile.description } : {}),
    patterns: profile.rules.map((rule) => ({
      name: rule.id,
      pattern: rule.matcher.source,
      flags: rule.matcher.flags.replace('g', ''),
      replacement: rule.replacement,
      enabled: rule.enabled,
    })),
    entropy: {
      enabled: profile.entropy.enabled,
      threshold: profile.entropy.threshold,
      min_length: profile.entropy.minLength,
    },
    key_paths: profile.keyPaths.map((rule) => ({
      path: rule.path,
      action: rule.action,
      replacement: rule.replacement,
    })),
    filename_patterns: [...profile.filenamePatterns],
  };
}
