import { DevicePhase } from '../types';

export enum FlexErrorCode {
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  UNSUPPORTED_SOURCE = 'UNSUPPORTED_SOURCE',
  NOT_CONNECTED = 'NOT_CONNECTED',
  MALFORMED_CHUNK = 'MALFORMED_CHUNK',
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_ABORTED = 'CONNECTION_ABORTED',
  INVALID_CONFIG = 'INVALID_CONFIG'
}

/**
 * Base class for every error raised by this package
 */
export class FlexError extends Error {
  public readonly name: string = 'FlexError';

  constructor(
    public readonly code: FlexErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Get detailed error information for debugging
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * A volume value outside the range the amplifier accepts
 */
export class OutOfRangeError extends FlexError {
  public readonly name = 'OutOfRangeError';

  constructor(
    public readonly value: number,
    public readonly min: number,
    public readonly max: number,
    unit: string
  ) {
    super(FlexErrorCode.OUT_OF_RANGE, `${unit} must be between ${min} and ${max}, got ${value}`, { value, min, max });
  }
}

export class UnsupportedSourceError extends FlexError {
  public readonly name = 'UnsupportedSourceError';

  constructor(public readonly source: unknown) {
    super(FlexErrorCode.UNSUPPORTED_SOURCE, `Unsupported input source "${String(source)}"`, { source });
  }
}

/**
 * Thrown by command methods when the device has no open connection.
 * Nothing has been written to the transport.
 */
export class NotConnectedError extends FlexError {
  public readonly name = 'NotConnectedError';

  constructor(public readonly phase: DevicePhase) {
    super(FlexErrorCode.NOT_CONNECTED, `Device is not connected (phase ${phase})`, { phase });
  }
}

export class MalformedChunkError extends FlexError {
  public readonly name = 'MalformedChunkError';

  constructor(public readonly offset: number, public readonly byte: number) {
    super(FlexErrorCode.MALFORMED_CHUNK, `Non-ASCII byte 0x${byte.toString(16)} at offset ${offset}`, { offset, byte });
  }
}

export class ConnectionFailedError extends FlexError {
  public readonly name = 'ConnectionFailedError';

  constructor(public readonly descriptor: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(FlexErrorCode.CONNECTION_FAILED, `Failed to connect to ${descriptor}: ${detail}`, { descriptor }, { cause });
  }
}

/**
 * Error thrown when a connection attempt is aborted
 * This is typically used when stop() is called during start()
 */
export class ConnectionAbortedError extends FlexError {
  public readonly name = 'ConnectionAbortedError';

  constructor(public readonly descriptor: string) {
    super(FlexErrorCode.CONNECTION_ABORTED, `Connection to ${descriptor} was stopped before it was established`, { descriptor });
  }
}

export class ConfigError extends FlexError {
  public readonly name = 'ConfigError';

  constructor(public readonly issues: string[]) {
    super(FlexErrorCode.INVALID_CONFIG, `Invalid connection configuration: ${issues.join('; ')}`, { issues });
  }
}
