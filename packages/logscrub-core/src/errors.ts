export class ProfileLoadError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = 'ProfileLoadError';
  }
}

/**
 * Raised when a profile document parses but cannot become a usable profile.
 * Every problem found is listed in `errors`, not just the first.
 */
export class ProfileValidationError extends ProfileLoadError {
  readonly errors: string[];

  constructor(errors: string[], profileName?: string) {
    const subject = profileName ? `Profile "${profileName}"` : 'Profile';
    super(`${subject} validation failed:\n- ${errors.join('\n- ')}`);
    this.name = 'ProfileValidationError';
    this.errors = errors;
  }
}

export type BackendErrorCode = 'timeout' | 'exit' | 'spawn' | 'protocol';

export class BackendError extends Error {
  readonly backend: string;
  readonly code: BackendErrorCode;

  constructor(backend: string, code: BackendErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = 'BackendError';
    this.backend = backend;
    this.code = code;
  }
}
