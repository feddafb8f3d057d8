import { config } from '../config.js';

export type RelayErrorCode =
  | 'invalid_handshake'
  | 'invalid_device_id'
  | 'malformed_frame'
  | 'send_timeout'
  | 'send_failed'
  | 'connection_closed';

export class RelayError extends Error {
  constructor(
    public readonly code: RelayErrorCode,
    message: string,
    /**
     * Optional extra context. Only returned over HTTP outside production.
     */
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

/** The first message of an ingest connection was not a usable stream description. */
export class HandshakeError extends RelayError {
  constructor(message: string, details?: unknown) {
    super('invalid_handshake', message, details);
    this.name = 'HandshakeError';
  }
}

/** A single outbound message could not be delivered to one peer. */
export class DeliveryError extends RelayError {
  constructor(
    public readonly peerId: string,
    code: Extract<RelayErrorCode, 'send_timeout' | 'send_failed' | 'connection_closed'>,
    cause?: unknown,
  ) {
    super(code, `delivery to ${peerId} failed: ${code}`, cause instanceof Error ? cause.message : undefined);
    this.name = 'DeliveryError';
  }
}

export function formatErrorResponse(error: unknown): { error: string; details?: unknown } {
  const isDev = config.nodeEnv !== 'production';

  if (error instanceof RelayError) {
    return {
      error: error.message,
      ...(isDev && error.details !== undefined ? { details: error.details } : {}),
    };
  }

  return {
    error: 'Internal server error',
    ...(isDev ? { details: error instanceof Error ? error.message : 'Unknown error' } : {}),
  };
}
