import type { ErrorInfo, ErrorKind, ErrorLocation } from '../schema/index.js';

// ── Base ──────────────────────────────────────────────────────

export abstract class OrchestratorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ── Browser lifecycle ─────────────────────────────────────────

export class BrowserLaunchError extends OrchestratorError {
  readonly kind = 'browser_launch';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'BrowserLaunchError';
  }
}

export type HealthProblem =
  | 'crashed'
  | 'not_initialized'
  | 'disconnected'
  | 'page_closed';

export type DisconnectReason = HealthProblem | 'connection_lost';

const DISCONNECT_MESSAGES: Record<DisconnectReason, string> = {
  crashed: 'Browser has crashed',
  not_initialized: 'Browser not initialized',
  disconnected: 'Browser disconnected',
  page_closed: 'Page is closed',
  connection_lost:
    'Browser connection lost - the page, context, or browser was closed during execution',
};

const CRASH_NOTE =
  ' (browser crashed - this may be due to memory issues, page complexity, or browser bugs)';

export class BrowserDisconnectedError extends OrchestratorError {
  readonly kind = 'browser_disconnected';
  readonly reason: DisconnectReason;
  readonly crashed: boolean;

  constructor(reason: DisconnectReason, crashed: boolean, cause?: unknown) {
    const base = DISCONNECT_MESSAGES[reason];
    super(crashed && reason !== 'crashed' ? base + CRASH_NOTE : base, { cause });
    this.name = 'BrowserDisconnectedError';
    this.reason = reason;
    this.crashed = crashed;
  }
}

// ── Step-level ────────────────────────────────────────────────

export class NavigationError extends OrchestratorError {
  readonly kind = 'navigation';
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: unknown) {
    super(
      `Failed to navigate to ${url} after ${String(attempts)} attempt${attempts === 1 ? '' : 's'}: ${messageOf(cause)}`,
      { cause },
    );
    this.name = 'NavigationError';
    this.url = url;
    this.attempts = attempts;
  }
}

export class InteractionError extends OrchestratorError {
  readonly kind = 'interaction';
  readonly action: string;
  readonly locator: string;

  constructor(action: string, locator: string, cause: unknown) {
    super(messageOf(cause), { cause });
    this.name = 'InteractionError';
    this.action = action;
    this.locator = locator;
  }
}

export class AssertionFailure extends OrchestratorError {
  readonly kind = 'assertion';

  constructor(message: string) {
    super(message);
    this.name = 'AssertionFailure';
  }
}

export class TimeoutError extends OrchestratorError {
  readonly kind = 'timeout';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TimeoutError';
  }
}

export class RunCancelledError extends OrchestratorError {
  readonly kind = 'cancelled';

  constructor(reason: string) {
    super(`Run cancelled: ${reason}`);
    this.name = 'RunCancelledError';
  }
}

// ── Conversion ────────────────────────────────────────────────

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flatten any thrown value into the structured error carried by results.
 * Unclassified errors take `fallback`.
 */
export function toErrorInfo(
  err: unknown,
  fallback: ErrorKind = 'unexpected',
  location?: ErrorLocation,
): ErrorInfo {
  const kind = err instanceof OrchestratorError ? err.kind : fallback;
  return {
    kind,
    message: messageOf(err),
    ...(location !== undefined ? { location } : {}),
  };
}
