/**
 * Optional process-wide error handlers
 *
 * Keeps a long-running process (such as the flexctl CLI) alive when a lost
 * serial port or socket surfaces as an unhandled rejection.
 *
 * ```typescript
 * import { setupGlobalErrorHandlers } from 'fusion-flex-control';
 *
 * const remove = setupGlobalErrorHandlers({
 *   onUnhandledRejection: (reason) => console.error('unhandled:', reason)
 * });
 * // ...
 * remove();
 * ```
 */

import { FlexError } from './errors';

export interface GlobalErrorHandlerOptions {
  onUnhandledRejection?: (reason: unknown, promise: Promise<unknown>) => void;
  onUncaughtException?: (error: Error, origin: string) => void;
  /**
   * Keep the process running after an uncaught exception (default true)
   */
  preventExit?: boolean;
}

/**
 * Install the handlers
 * @returns cleanup function that removes them again
 */
export function setupGlobalErrorHandlers(options: GlobalErrorHandlerOptions = {}): () => void {
  const {
    onUnhandledRejection = defaultUnhandledRejectionHandler,
    onUncaughtException = defaultUncaughtExceptionHandler,
    preventExit = true
  } = options;

  const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
    console.error('[flex] Unhandled promise rejection:', describe(reason));
    onUnhandledRejection(reason, promise);
  };

  const uncaughtExceptionHandler = (error: Error, origin: string) => {
    console.error(`[flex] Uncaught exception (${origin}):`, error.stack ?? error.message);
    onUncaughtException(error, origin);
    if (!preventExit) {
      process.exit(1);
    }
  };

  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('uncaughtException', uncaughtExceptionHandler);

  return () => {
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('uncaughtException', uncaughtExceptionHandler);
  };
}

function describe(reason: unknown): string {
  if (reason instanceof FlexError) return JSON.stringify(reason.toJSON());
  if (reason instanceof Error) return reason.stack ?? reason.message;
  return String(reason);
}

function defaultUnhandledRejectionHandler(reason: unknown): void {
  if (isNetworkError(reason)) {
    console.warn('[flex] Network error caught, process continues');
  }
}

function defaultUncaughtExceptionHandler(error: Error): void {
  if (!isNetworkError(error)) {
    console.error('[flex] Unexpected error, check application logic');
  }
}

const NETWORK_ERROR_CODES = [
  'EHOSTDOWN',
  'EHOSTUNREACH',
  'ENETDOWN',
  'ENETUNREACH',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EADDRINUSE'
];

/**
 * True for socket and port errors carrying one of the usual errno codes
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) return true;
  return NETWORK_ERROR_CODES.some((c) => error.message.includes(c));
}
