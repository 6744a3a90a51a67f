/**
 * Error taxonomy for thread operations.
 *
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 *
 * Nothing here is retried; callers receive the error as-is.
 */
export type OutlineChatErrorCode = 'STRUCTURAL' | 'TRANSPORT' | 'CONFIGURATION';

export class OutlineChatError extends Error {
  readonly code: OutlineChatErrorCode;

  constructor(code: OutlineChatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Traversal or node creation attempted outside a valid tree context
 * (no current node, a node from another document, an empty outline).
 */
export class StructuralError extends OutlineChatError {
  constructor(message: string) {
    super('STRUCTURAL', message);
  }
}

/**
 * Failure reported by the transport collaborator. The original failure is
 * kept as `cause`.
 */
export class TransportError extends OutlineChatError {
  constructor(message: string, cause: unknown) {
    super('TRANSPORT', message, { cause });
  }
}

/**
 * Missing or malformed configuration, including an unusable storage directory.
 */
export class ConfigurationError extends OutlineChatError {
  constructor(message: string, cause?: unknown) {
    super('CONFIGURATION', message, cause === undefined ? undefined : { cause });
  }
}

/**
 * Render any thrown value as a single line for CLI and tool output.
 */
export function describeError(error: unknown): string {
  if (error instanceof OutlineChatError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
