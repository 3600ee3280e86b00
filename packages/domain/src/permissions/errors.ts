export class DomainError extends Error {
  constructor(message: string, readonly code: string = 'domain_error') {
    super(message);
    this.name = 'DomainError';
  }
}

/**
 * A request violated its construction invariants (targeting mode, realm).
 * Raised locally and synchronously; such a request is never persisted.
 */
export class MalformedRequestError extends DomainError {
  constructor(message: string) {
    super(message, 'malformed_request');
    this.name = 'MalformedRequestError';
  }
}

export class MalformedStatusError extends DomainError {
  constructor(message: string) {
    super(message, 'malformed_status');
    this.name = 'MalformedStatusError';
  }
}
