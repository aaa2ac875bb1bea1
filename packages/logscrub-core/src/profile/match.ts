import path from 'node:path';

import { minimatch } from 'minimatch';

import type { Profile } from './types.js';

/**
 * First profile whose `filename_patterns` match the file's base name,
 * compared case-insensitively.
 */
export function matchProfileForFile<P extends Pick<Profile, 'filenamePatterns'>>(
  filePath: string,
  profiles: Iterable<P>,
): P | undefined {
  const basename = path.basename(filePath);
  for (const profile of profiles) {
    for (const pattern of profile.filenamePatterns) {
      if (minimatch(basename, pattern, { nocase: true, dot: true })) {
        return profile;
      }
    }
  }
  return undefined;
}
