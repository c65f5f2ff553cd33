/**
 * Protocol errors thrown by the method handlers and turned into responses by
 * the dispatcher. Messages are safe to show to clients: they never contain
 * filesystem paths.
 */
export class DavError extends Error {
  /**
   * @param status - HTTP status code sent to the client
   * @param condition - WebDAV precondition element (RFC 4918 §16) rendered in a `<d:error>` body
   */
  constructor(
    readonly status: number,
    message: string,
    readonly condition?: string
  ) {
    super(message);
    this.name = 'DavError';
  }
}

export class BadRequestError extends DavError {
  constructor(message: string) {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

/** Traversal, hidden item or extension violation. Raised before the storage is touched. */
export class PathRejectedError extends DavError {
  constructor(message: string = 'Forbidden') {
    super(403, message);
    this.name = 'PathRejectedError';
  }
}

/** An authorization hook answered false. */
export class AuthorizationDeniedError extends DavError {
  constructor(operation: string) {
    super(403, `${operation} not allowed`);
    this.name = 'AuthorizationDeniedError';
  }
}

export class NotFoundError extends DavError {
  constructor(resource: string) {
    super(404, `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends DavError {
  constructor(message: string) {
    super(405, message);
    this.name = 'MethodNotAllowedError';
  }
}

export class ConflictError extends DavError {
  constructor(message: string) {
    super(409, message);
    this.name = 'ConflictError';
  }
}

export class PreconditionFailedError extends DavError {
  constructor(message: string, condition?: string) {
    super(412, message, condition);
    this.name = 'PreconditionFailedError';
  }
}

export class UnsupportedRequestError extends DavError {
  constructor(status: 403 | 415, message: string, condition?: string) {
    super(status, message, condition);
    this.name = 'UnsupportedRequestError';
  }
}
