export * from './types.js';
export { validateProfile, compileProfile } from './validator.js';
export {
  BUILTIN_PROFILES,
  applyProfileOverrides,
  builtinProfilesDir,
  isBuiltinRef,
  loadProfile,
  loadProfileDocument,
  loadProfileFromString,
  mergeProfiles,
  resolveProfileChain,
  resolveProfilePath,
  type ProfileLoadOptions,
  type ProfileOverrides,
} from './loader.js';
export { matchProfileForFile } from './match.js';
export { ProfileStore, type ProfileStoreState } from './store.js';
