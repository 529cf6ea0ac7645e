/**
 * Structured Error System for the ontology graph
 *
 * Provides machine-readable errors with codes, source locations and suggestions.
 */

/**
 * Error codes for ingestion and graph operations
 */
export type GraphErrorCode =
  | 'PARSE_ERROR'           // Malformed source file
  | 'DEPENDENCY_MISSING'    // Annotation support disabled
  | 'DANGLING_REFERENCE'    // Relationship endpoint not in the store
  | 'DUPLICATE_ENTITY'      // Key seen again, merged (informational)
  | 'NOT_FOUND'             // Entity/relationship id not present
  | 'UNMATCHED_ANNOTATION'  // Annotation key matched no entity
  | 'SOURCE_NOT_FOUND'      // File missing or unreadable
  | 'INVALID_ARGUMENT'      // Bad caller input or configuration
  | 'STORE_CORRUPTED';      // Store invariant violated

/**
 * Structured error with code, message and optional context
 */
export interface GraphError {
  code: GraphErrorCode;
  message: string;
  source?: string;           // File or source label the error belongs to
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping GraphError for throw/catch patterns
 */
export class GraphException extends Error {
  public readonly error: GraphError;

  constructor(error: GraphError) {
    super(error.message);
    this.name = 'GraphException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphException);
    }
  }

  get code(): GraphErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): GraphError {
    return this.error;
  }
}

/**
 * Create a parse error for a malformed source file
 */
export function createParseError(
  source: string,
  message: string,
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code: 'PARSE_ERROR',
    message: `Failed to parse ${source}: ${message}`,
    source,
    suggestion: 'Check that the file is well-formed; it was skipped and the rest of the batch continued',
    details,
  });
}

/**
 * Create the error reported when annotation support is switched off
 */
export function createDependencyMissingError(source: string): GraphException {
  return new GraphException({
    code: 'DEPENDENCY_MISSING',
    message: `Annotation support is disabled; ${source} was not read`,
    source,
    suggestion: 'Set GRAPH_ANNOTATIONS=on (or annotationSupport: true) to enable tabular annotations',
  });
}

/**
 * Create a dangling reference error
 */
export function createDanglingReferenceError(
  missing: string[],
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code: 'DANGLING_REFERENCE',
    message: `Relationship endpoint not found: ${missing.join(', ')}`,
    suggestion: 'Add both entities before relating them',
    details: { missing, ...details },
  });
}

/**
 * Create a not found error
 */
export function createNotFoundError(id: string, what: string = 'Entity'): GraphException {
  return new GraphException({
    code: 'NOT_FOUND',
    message: `${what} '${id}' not found`,
    details: { id },
  });
}

/**
 * Create a source not found error
 */
export function createSourceNotFoundError(source: string, reason?: string): GraphException {
  return new GraphException({
    code: 'SOURCE_NOT_FOUND',
    message: reason ? `Cannot read ${source}: ${reason}` : `Source not found: ${source}`,
    source,
  });
}

/**
 * Create an invalid argument error
 */
export function createInvalidArgumentError(
  message: string,
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code: 'INVALID_ARGUMENT',
    message,
    details,
  });
}

/**
 * Create a store corruption error
 */
export function createStoreCorruptedError(issues: string[]): GraphException {
  return new GraphException({
    code: 'STORE_CORRUPTED',
    message: `Graph store invariants violated (${issues.length} issue${issues.length === 1 ? '' : 's'})`,
    suggestion: 'The manager is now in the failed state; rebuild it from the source files',
    details: { issues },
  });
}

/**
 * Serialize a GraphError for JSON output
 */
export function serializeGraphError(error: GraphError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.source && { source: error.source }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Generic error factory for simple error creation
 */
export function createError(
  code: GraphErrorCode,
  message: string,
  details?: Record<string, unknown>
): GraphError {
  return {
    code,
    message,
    details,
  };
}

/**
 * Create a generic graph exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: GraphErrorCode,
  message: string,
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code,
    message,
    details,
  });
}

/**
 * Convert anything thrown into a GraphError, keeping structured errors intact
 */
export function toGraphError(
  error: unknown,
  fallbackCode: GraphErrorCode,
  source?: string
): GraphError {
  if (error instanceof GraphException) {
    return error.error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallbackCode, message, ...(source && { source }) };
}
