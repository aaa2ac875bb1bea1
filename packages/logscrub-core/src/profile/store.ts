import { watch } from 'chokidar';

import { silentLogger, type Logger } from '../logger.js';
import { loadProfile, resolveProfileChain, type ProfileLoadOptions } from './loader.js';
import type { Profile } from './types.js';

export type ProfileStoreState = 'loading' | 'ready';

/**
 * Holds the profile every redact call reads. A reload compiles the new
 * profile off to the side and swaps the reference in one assignment, so a
 * caller that already holds the old profile keeps using it unchanged.
 */
export class ProfileStore {
  private profile: Profile | null = null;
  private revision = 0;
  private watcher: ReturnType<typeof watch> | null = null;
  private watched = new Set<string>();
  private readonly ref: string | null;
  private readonly loadOptions: ProfileLoadOptions;
  private readonly logger: Logger;

  private constructor(ref: string | null, loadOptions: ProfileLoadOptions, logger: Logger) {
    this.ref = ref;
    this.loadOptions = loadOptions;
    this.logger = logger;
  }

  /** Load `ref` now; throws if it does not compile. */
  static fromRef(ref: string, options: ProfileLoadOptions & { logger?: Logger } = {}): ProfileStore {
    const { logger, ...loadOptions } = options;
    const store = new ProfileStore(ref, loadOptions, logger ?? silentLogger);
    store.reload();
    return store;
  }

  static fromProfile(profile: Profile, logger: Logger = silentLogger): ProfileStore {
    const store = new ProfileStore(null, {}, logger);
    store.replace(profile);
    return store;
  }

  get state(): ProfileStoreState {
    return this.profile ? 'ready' : 'loading';
  }

  current(): Profile {
    if (!this.profile) {
      throw new Error('Profile store has no profile loaded');
    }
    return this.profile;
  }

  /** Swap in an already compiled profile under the next revision. */
  replace(profile: Profile): Profile {
    const next: Profile = Object.freeze({ ...profile, revision: ++this.revision });
    this.profile = next;
    return next;
  }

  /**
   * Re-read the profile from its source. On failure the previous profile
   * stays current and the error is rethrown.
   */
  reload(): Profile {
    if (this.ref === null) {
      throw new Error('Profile store was not created from a profile reference');
    }
    const next = loadProfile(this.ref, { ...this.loadOptions, revision: this.revision + 1 });
    this.revision = next.revision;
    this.profile = next;
    this.logger.info(`Profile "${next.name}" loaded (revision ${next.revision})`);
    return next;
  }

  /** Reload whenever the profile file, or any base it extends, changes. */
  watch(): void {
    if (this.ref === null || this.watcher) return;
    const files = resolveProfileChain(this.ref, this.loadOptions);
    this.watched = new Set(files);

    const watcher = watch(files, {
      persistent: true,
      ignoreInitial: true,
    });
    this.watcher = watcher;

    watcher.on('change', (changed: string) => {
      this.logger.info(`Profile file changed: ${changed}`);
      try {
        this.reload();
        this.syncWatched(watcher);
      } catch (error) {
        this.logger.error(
          `Failed to reload profile: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });

    this.logger.debug(`Watching profile files: ${files.join(', ')}`);
  }

  /** Follow an `extends` chain that changed in the last reload. */
  private syncWatched(watcher: ReturnType<typeof watch>): void {
    if (this.ref === null) return;
    const files = resolveProfileChain(this.ref, this.loadOptions);
    const added = files.filter((file) => !this.watched.has(file));
    const removed = [...this.watched].filter((file) => !files.includes(file));
    if (added.length > 0) watcher.add(added);
    if (removed.length > 0) watcher.unwatch(removed);
    this.watched = new Set(files);
  }

  async close(): Promise<void> {
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      this.watched = new Set();
      await watcher.close();
      this.logger.debug('Stopped watching profile files');
    }
  }
}
