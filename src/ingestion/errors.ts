/**
 * Ingestion error classes.
 *
 * Domain-specific errors for building and reading the filesystem node tree.
 * All errors include error codes for categorization and support cause chaining.
 *
 * @module ingestion/errors
 */

/**
 * Base error class for ingestion operations.
 *
 * Includes error code for categorization and supports cause chaining for debugging.
 */
export class IngestionError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;

  constructor(message: string, code: string = "INGESTION_ERROR", cause?: Error) {
    super(message);
    this.name = "IngestionError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Error thrown when input validation fails.
 *
 * Used for malformed queries and single-file requests that resolve to a directory.
 */
export class ValidationError extends IngestionError {
  public readonly field: string;

  constructor(message: string, field: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Error thrown when the requested root does not exist.
 *
 * The message names the query slug, not the local path.
 */
export class PathNotFoundError extends IngestionError {
  public readonly path: string;

  constructor(slug: string, path: string, cause?: Error) {
    super(`${slug} cannot be found`, "PATH_NOT_FOUND", cause);
    this.name = "PathNotFoundError";
    this.path = path;
  }
}

/**
 * Error thrown when a single-file ingestion resolves to no content.
 */
export class EmptyContentError extends IngestionError {
  public readonly fileName: string;

  constructor(fileName: string) {
    super(`File ${fileName} has no content`, "EMPTY_CONTENT");
    this.name = "EmptyContentError";
    this.fileName = fileName;
  }
}

/**
 * Error thrown when an operation is not valid for a node's kind.
 *
 * @example
 * ```typescript
 * try {
 *   await resolveContent(directoryNode);
 * } catch (error) {
 *   if (error instanceof InvalidNodeStateError) {
 *     console.error(error.message); // "Cannot read content of a directory node"
 *   }
 * }
 * ```
 */
export class InvalidNodeStateError extends IngestionError {
  constructor(message: string) {
    super(message, "INVALID_NODE_STATE");
    this.name = "InvalidNodeStateError";
  }
}

/**
 * Error thrown when the ingestion root is neither a file nor a directory.
 */
export class UnsupportedNodeTypeError extends IngestionError {
  public readonly path: string;

  constructor(path: string) {
    super(`Unsupported file type at ${path}`, "UNSUPPORTED_NODE_TYPE");
    this.name = "UnsupportedNodeTypeError";
    this.path = path;
  }
}

/**
 * Error thrown when a user pattern contains characters outside the allow-list.
 */
export class InvalidPatternError extends IngestionError {
  public readonly pattern: string;

  constructor(pattern: string) {
    super(
      `Pattern '${pattern}' contains invalid characters. Only alphanumeric characters, dash (-), ` +
        "underscore (_), dot (.), forward slash (/), plus (+), asterisk (*) and at sign (@) are allowed.",
      "INVALID_PATTERN"
    );
    this.name = "InvalidPatternError";
    this.pattern = pattern;
  }
}

/**
 * Error raised while converting a notebook to script text.
 *
 * Never escapes content resolution: the message becomes the file's content.
 */
export class NotebookConversionError extends IngestionError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: Error) {
    super(message, "NOTEBOOK_CONVERSION_ERROR", cause);
    this.name = "NotebookConversionError";
    this.path = path;
  }
}

/**
 * Type guard for ingestion errors.
 */
export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}
