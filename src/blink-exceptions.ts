const BODY_SNIPPET_LENGTH = 200;

export class BlinkException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BlinkException';
  }
}

export type AuthFailureReason =
  | 'missing-credentials'
  | 'invalid-credentials'
  | 'verification-required'
  | 'not-authenticated'
  | 'token-expired';

export class BlinkAuthenticationException extends BlinkException {
  readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string) {
    super(message);
    this.name = 'BlinkAuthenticationException';
    this.reason = reason;
  }
}

export class BlinkNetworkException extends BlinkException {
  readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(`Request to ${endpoint} failed: ${message}`);
    this.name = 'BlinkNetworkException';
    this.endpoint = endpoint;
  }
}

export class BlinkTimeoutException extends BlinkException {
  readonly endpoint: string;

  constructor(endpoint: string, timeoutMs: number) {
    super(`Request to ${endpoint} exceeded ${timeoutMs}ms`);
    this.name = 'BlinkTimeoutException';
    this.endpoint = endpoint;
  }
}

/**
 * The server answered, but not with what we expected: a non-2xx status or a body of the wrong
 * shape. `status` is null for well-formed HTTP responses whose payload could not be used.
 */
export class BlinkProtocolException extends BlinkException {
  readonly endpoint: string;
  readonly status: number | null;
  readonly body: string;

  constructor(endpoint: string, status: number | null, body: unknown, message?: string) {
    const snippet = toSnippet(body);
    super(
      message ??
        `Unexpected response from ${endpoint}${status === null ? '' : ` (${status})`}: ${snippet}`
    );
    this.name = 'BlinkProtocolException';
    this.endpoint = endpoint;
    this.status = status;
    this.body = snippet;
  }
}

export const isUnauthorized = (error: unknown) =>
  error instanceof BlinkProtocolException && error.status === 401;

const toSnippet = (body: unknown) => {
  let text: string;
  if (typeof body === 'string') {
    text = body;
  } else if (Buffer.isBuffer(body)) {
    text = body.toString('utf8');
  } else {
    text = JSON.stringify(body) ?? '';
  }

  return text.length > BODY_SNIPPET_LENGTH ? `${text.slice(0, BODY_SNIPPET_LENGTH)}...` : text;
};
