import type { CaptureMode } from './types.js';

export class DeviceOpenError extends Error {
  readonly deviceIndex: number;
  readonly mode: CaptureMode | 'any';

  constructor(
    message: string,
    details: { deviceIndex: number; mode: CaptureMode | 'any'; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'DeviceOpenError';
    this.deviceIndex = details.deviceIndex;
    this.mode = details.mode;
  }
}

/** Every candidate device failed to open; the server cannot start. */
export class CaptureUnavailableError extends Error {
  readonly attempts: readonly DeviceOpenError[];

  constructor(message: string, attempts: readonly DeviceOpenError[] = []) {
    super(message);
    this.name = 'CaptureUnavailableError';
    this.attempts = attempts;
  }
}

export class DeviceReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceReadError';
  }
}

export type ClientSendFailure = 'closed' | 'backpressure' | 'timeout' | 'transport';

export class ClientSendError extends Error {
  readonly clientId: string;
  readonly reason: ClientSendFailure;

  constructor(clientId: string, reason: ClientSendFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClientSendError';
    this.clientId = clientId;
    this.reason = reason;
  }
}

export class ConnectionAcceptError extends Error {
  readonly remoteAddress: string;

  constructor(message: string, remoteAddress: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionAcceptError';
    this.remoteAddress = remoteAddress;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
