/**
 * Error hierarchy for sessionscope.
 *
 * Every error carries a machine-readable `code` and a `context` object
 * for debug logging. Callers branch on the class, not on the message.
 */
export class SessionScopeError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionScopeError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** A transcript file is missing or cannot be read. */
export class TranscriptReadError extends SessionScopeError {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to read log file: ${filePath}`, 'TRANSCRIPT_READ', { path: filePath }, options);
    this.name = 'TranscriptReadError';
  }
}

/** A project's `.claude/CLAUDE.md` exists but cannot be read. */
export class InstructionsReadError extends SessionScopeError {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to read project instructions: ${filePath}`, 'INSTRUCTIONS_READ', { path: filePath }, options);
    this.name = 'InstructionsReadError';
  }
}

/** The metadata document exists but cannot be read, parsed or validated. */
export class MetadataLoadError extends SessionScopeError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'METADATA_LOAD', { path: filePath }, options);
    this.name = 'MetadataLoadError';
  }
}

/** Writing the metadata document failed. In-memory state is still valid. */
export class MetadataPersistError extends SessionScopeError {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to write metadata file: ${filePath}`, 'METADATA_PERSIST', { path: filePath }, options);
    this.name = 'MetadataPersistError';
  }
}

export class SessionNotFoundError extends SessionScopeError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class InvalidEnergyRatingError extends SessionScopeError {
  constructor(input: string) {
    super(
      `Invalid creative energy "${input}". Please enter 1, 2, or 3.`,
      'ENERGY_INVALID',
      { input },
    );
    this.name = 'InvalidEnergyRatingError';
  }
}

export class CommitError extends SessionScopeError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'GIT_COMMIT', context, options);
    this.name = 'CommitError';
  }
}

export class ConfigError extends SessionScopeError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', { path: filePath }, options);
    this.name = 'ConfigError';
  }
}
