/**
 * vaultweave error classes
 *
 * Hierarchical errors carrying:
 * - a numeric error code
 * - a fixed, sanitized user-facing message per code
 * - the original cause
 * - a recoverability flag
 *
 * Per-reference problems (broken or ambiguous links) are never thrown; they are
 * recorded in the note graph and the ingestion summary instead.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Embedding provider errors (2000-2099)
  EMBEDDING_FAILED = 2000,
  EMBEDDING_RATE_LIMIT = 2001,
  EMBEDDING_TIMEOUT = 2002,
  EMBEDDING_DIMENSION_MISMATCH = 2003,
  EMBEDDING_INVALID_RESPONSE = 2004,

  // Validation errors (3000-3099)
  VALIDATION_INVALID_FORMAT = 3000,
  VALIDATION_INVALID_PATTERN = 3001,
  VALIDATION_INVALID_QUERY = 3002,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_NO_SPACE = 4002,
  FS_READ_ERROR = 4003,
  FS_WRITE_ERROR = 4004,

  // Config errors (5000-5099)
  CONFIG_PARSE_ERROR = 5000,
  CONFIG_INVALID_VALUE = 5001,
  CONFIG_NOTES_DIR_NOT_FOUND = 5002,

  // Artifact errors (6000-6099)
  ARTIFACT_WRITE_FAILED = 6000,
  ARTIFACT_NOT_FOUND = 6001,
  ARTIFACT_CORRUPT = 6002,
  ARTIFACT_VERSION_MISMATCH = 6003,

  // Pipeline errors (7000-7099)
  INGESTION_ABORTED = 7000,
  CHUNKING_FAILED = 7001,
}

// ============================================================================
// Sanitized messages
// ============================================================================

const USER_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
  [ErrorCode.INTERNAL]: "An internal error occurred.",
  [ErrorCode.EMBEDDING_FAILED]: "The embedding provider could not process some content.",
  [ErrorCode.EMBEDDING_RATE_LIMIT]: "The embedding provider is rate limiting requests.",
  [ErrorCode.EMBEDDING_TIMEOUT]: "The embedding provider did not respond in time.",
  [ErrorCode.EMBEDDING_DIMENSION_MISMATCH]: "The embedding provider returned vectors of an unexpected size.",
  [ErrorCode.EMBEDDING_INVALID_RESPONSE]: "The embedding provider returned an invalid response.",
  [ErrorCode.VALIDATION_INVALID_FORMAT]: "Some input was not in the expected format.",
  [ErrorCode.VALIDATION_INVALID_PATTERN]: "A reference pattern is not a valid expression.",
  [ErrorCode.VALIDATION_INVALID_QUERY]: "The search request was not valid.",
  [ErrorCode.FS_FILE_NOT_FOUND]: "A required file could not be found.",
  [ErrorCode.FS_PERMISSION_DENIED]: "Permission was denied while accessing the notes.",
  [ErrorCode.FS_NO_SPACE]: "There is not enough disk space to write the index.",
  [ErrorCode.FS_READ_ERROR]: "A file could not be read.",
  [ErrorCode.FS_WRITE_ERROR]: "A file could not be written.",
  [ErrorCode.CONFIG_PARSE_ERROR]: "The configuration file could not be parsed.",
  [ErrorCode.CONFIG_INVALID_VALUE]: "The configuration contains an invalid value.",
  [ErrorCode.CONFIG_NOTES_DIR_NOT_FOUND]: "The notes folder could not be found.",
  [ErrorCode.ARTIFACT_WRITE_FAILED]: "The knowledge base index could not be saved.",
  [ErrorCode.ARTIFACT_NOT_FOUND]: "The knowledge base index has not been built yet.",
  [ErrorCode.ARTIFACT_CORRUPT]: "The knowledge base index is damaged and must be rebuilt.",
  [ErrorCode.ARTIFACT_VERSION_MISMATCH]: "The knowledge base index was built by an incompatible version.",
  [ErrorCode.INGESTION_ABORTED]: "Indexing was stopped before it completed.",
  [ErrorCode.CHUNKING_FAILED]: "A note could not be split for indexing.",
};

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.EMBEDDING_FAILED,
  ErrorCode.EMBEDDING_RATE_LIMIT,
  ErrorCode.EMBEDDING_TIMEOUT,
  ErrorCode.FS_NO_SPACE,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export class VaultweaveError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      recoverable?: boolean;
    }
  ) {
    super(message || USER_MESSAGES[code]);

    this.name = "VaultweaveError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Message safe to hand to a web layer: fixed per code, never the internal detail
   */
  getUserMessage(): string {
    return USER_MESSAGES[this.code];
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Embedding provider failures
 */
export class EmbeddingError extends VaultweaveError {
  public readonly attempts?: number;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      attempts?: number;
      recoverable?: boolean;
    }
  ) {
    super(code, message, options);
    this.name = "EmbeddingError";
    this.attempts = options?.attempts;
  }

  /**
   * Classify a provider error by its message
   */
  static fromError(error: unknown, attempts?: number): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const cause = isErrorLike(error) ? error : undefined;
    const message = cause ? cause.message : String(error);
    const lowerMessage = message.toLowerCase();

    if (lowerMessage.includes("rate_limit") || lowerMessage.includes("rate limit") || lowerMessage.includes("429")) {
      return new EmbeddingError(ErrorCode.EMBEDDING_RATE_LIMIT, message, { cause, attempts });
    }
    if (lowerMessage.includes("timeout") || lowerMessage.includes("etimedout")) {
      return new EmbeddingError(ErrorCode.EMBEDDING_TIMEOUT, message, { cause, attempts });
    }

    return new EmbeddingError(ErrorCode.EMBEDDING_FAILED, message, { cause, attempts });
  }
}

/**
 * Validation errors
 */
export class ValidationError extends VaultweaveError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      field?: string;
      value?: unknown;
    }
  ) {
    super(code, message, options);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * File system errors raised while reading the vault
 */
export class FileSystemError extends VaultweaveError {
  public readonly path?: string;
  public readonly operation?: "read" | "write" | "access";

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      path?: string;
      operation?: "read" | "write" | "access";
      recoverable?: boolean;
    }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(error: NodeJS.ErrnoException, path?: string, operation?: FileSystemError["operation"]): FileSystemError {
    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, error.message, { cause: error, path, operation });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, error.message, { cause: error, path, operation });
      case "ENOSPC":
        return new FileSystemError(ErrorCode.FS_NO_SPACE, error.message, { cause: error, path, operation });
      default:
        return new FileSystemError(
          operation === "write" ? ErrorCode.FS_WRITE_ERROR : ErrorCode.FS_READ_ERROR,
          error.message,
          { cause: error, path, operation }
        );
    }
  }
}

/**
 * Vector database artifact errors. A write failure is fatal to an ingestion run.
 */
export class ArtifactError extends VaultweaveError {
  public readonly artifactPath: string;

  constructor(
    code: ErrorCode,
    artifactPath: string,
    message?: string,
    options?: { cause?: Error }
  ) {
    super(code, message, { ...options, recoverable: false });
    this.name = "ArtifactError";
    this.artifactPath = artifactPath;
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends VaultweaveError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      configKey?: string;
    }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "detailed";

/**
 * Format error for user display. The minimal level never includes internal detail.
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "minimal"): string {
  const normalized = toVaultweaveError(error);
  let message = normalized.getUserMessage();

  if (level === "detailed") {
    message += `\n[code ${normalized.code}] ${normalized.message}`;
    if (normalized.cause) {
      message += `\n[cause] ${normalized.cause.message}`;
    }
    if (normalized instanceof FileSystemError && normalized.path) {
      message += `\n[path] ${normalized.path}`;
    }
    if (normalized instanceof ArtifactError) {
      message += `\n[artifact] ${normalized.artifactPath}`;
    }
  }

  return message;
}

/**
 * Check if an error is worth retrying
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof VaultweaveError) {
    return error.recoverable;
  }

  if (isErrorLike(error)) {
    const message = error.message.toLowerCase();
    return (
      message.includes("rate_limit") ||
      message.includes("timeout") ||
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("etimedout") ||
      message.includes("network")
    );
  }

  return false;
}

/**
 * Structural Error check. Errors raised by Node's own modules come from another
 * realm under some test runners and fail `instanceof Error`.
 */
export function isErrorLike(error: unknown): error is Error {
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string" &&
    "name" in error &&
    typeof error.name === "string"
  );
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return isErrorLike(error) && "code" in error && typeof error.code === "string";
}

/**
 * The value as an error `cause`, when it is one
 */
export function toErrorCause(error: unknown): Error | undefined {
  return isErrorLike(error) ? error : undefined;
}

/**
 * Convert any thrown value to a vaultweave error
 */
export function toVaultweaveError(error: unknown): VaultweaveError {
  if (error instanceof VaultweaveError) {
    return error;
  }

  if (isErrnoException(error) && ["ENOENT", "EACCES", "EPERM", "ENOSPC"].includes(error.code ?? "")) {
    return FileSystemError.fromNodeError(error);
  }

  if (isErrorLike(error)) {
    return new VaultweaveError(ErrorCode.UNKNOWN, error.message, { cause: error });
  }

  return new VaultweaveError(ErrorCode.UNKNOWN, String(error));
}
