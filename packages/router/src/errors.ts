/**
 * Router errors.
 *
 * A path that matches nothing is not an error; `find` returns `null` for it.
 * These are raised only while a router is being built.
 */

/**
 * Base class for errors raised by the router.
 */
export class RouterError extends Error {
  /** Machine-readable error code */
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "RouterError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when a route is registered twice for the same method at the same
 * tree node and the tree rejects duplicates.
 */
export class RouteConflictError extends RouterError {
  readonly method: string;
  readonly pattern: string;

  constructor(method: string, pattern: string) {
    super(`Route already registered: ${method} ${pattern}`, "ROUTE_CONFLICT");
    this.name = "RouteConflictError";
    this.method = method;
    this.pattern = pattern;
  }
}

/**
 * Thrown when routes are added to a router after it was sealed for serving.
 */
export class RouterSealedError extends RouterError {
  constructor(operation: string) {
    super(`Router is sealed; cannot ${operation}`, "ROUTER_SEALED");
    this.name = "RouterSealedError";
  }
}
