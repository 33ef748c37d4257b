/**
 * Error taxonomy for pane discovery and capture
 */

export type PanewatchErrorCode =
  | 'DISCOVERY_FAILED'
  | 'CAPTURE_FAILED'
  | 'PROCESS_QUERY_FAILED'
  | 'PARSE_FAILED'
  | 'USAGE';

export class PanewatchError extends Error {
  readonly code: PanewatchErrorCode;

  constructor(message: string, code: PanewatchErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The multiplexer could not be queried for its panes. */
export class DiscoveryError extends PanewatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DISCOVERY_FAILED', options);
  }
}

/** A pane's output could not be captured (bad or vanished pane id). */
export class CaptureError extends PanewatchError {
  readonly paneId: string;

  constructor(paneId: string, message: string, options?: { cause?: unknown }) {
    super(message, 'CAPTURE_FAILED', options);
    this.paneId = paneId;
  }
}

export class ProcessQueryError extends PanewatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROCESS_QUERY_FAILED', options);
  }
}

export class ParseError extends PanewatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PARSE_FAILED', options);
  }
}

export class UsageError extends PanewatchError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
