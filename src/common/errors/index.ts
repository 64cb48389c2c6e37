import { RelayFailureKind } from '../interfaces';

/**
 * Failures that belong to a chat completion call itself. The exception filter
 * renders all of them as the `invalid_request_error` envelope; routing
 * failures use Nest's HTTP exceptions instead.
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed request body or messages. Raised before any upstream call. */
export class ValidationError extends GatewayError {
  readonly kind = 'validation';
}

export type UpstreamParseErrorKind = 'malformed_json' | 'missing_field' | 'unexpected_type';

export class UpstreamParseError extends GatewayError {
  constructor(
    readonly kind: UpstreamParseErrorKind,
    message: string,
  ) {
    super(message);
  }
}

export class UpstreamSessionError extends GatewayError {
  readonly kind = 'session';

  constructor(reason: string) {
    super(`Failed to meet chat requirements, ${reason}`);
  }
}

export type UpstreamTransportErrorKind = RelayFailureKind | 'closed';

export class UpstreamTransportError extends GatewayError {
  constructor(
    readonly kind: UpstreamTransportErrorKind,
    message: string,
  ) {
    super(message);
  }
}

/** The client went away before the response was committed; nothing is sent. */
export class ClientClosedError extends GatewayError {
  readonly kind = 'client_closed';

  constructor() {
    super('Client closed the connection before the response started');
  }
}
