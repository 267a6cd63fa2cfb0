/**
 * NetworkErrors.ts
 * Failure taxonomy for phone/watch synchronization
 *
 * Peer, decode and store failures are absorbed by the endpoints: they are
 * built here, logged through toErrorReport(), and never thrown to callers.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum SyncErrorCode {
  // Peer errors (1xx)
  NO_PEER_REACHABLE = 100,
  PEER_SEND_FAILED = 101,
  PEER_LOOKUP_FAILED = 102,
  SYNC_TIMEOUT = 103,

  // Decode errors (2xx)
  MALFORMED_JSON = 200,
  INVALID_SNAPSHOT = 201,
  INVALID_ACTION_PAYLOAD = 202,
  MISSING_DATA_ENTRY = 203,
  UNKNOWN_PATH = 204,

  // Store errors (3xx)
  STORE_READ_FAILED = 300,
  STORE_WRITE_FAILED = 301,

  // General errors (9xx)
  UNKNOWN_ERROR = 900,
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base sync error
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

/**
 * Peer lookup and delivery errors
 */
export class PeerError extends SyncError {
  constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PeerError';
    Object.setPrototypeOf(this, PeerError.prototype);
  }
}

/**
 * Payload decoding errors
 */
export class DecodeError extends SyncError {
  constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Authoritative store errors (phone side)
 */
export class StoreError extends SyncError {
  constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export const Errors = {
  // Peer
  noPeerReachable: (path: string) =>
    new PeerError(SyncErrorCode.NO_PEER_REACHABLE, `No connected peer for ${path}`, { path }),
  peerSendFailed: (nodeId: string, path: string, cause: unknown) =>
    new PeerError(
      SyncErrorCode.PEER_SEND_FAILED,
      `Send to ${nodeId} failed on ${path}: ${describeCause(cause)}`,
      { nodeId, path }
    ),
  peerLookupFailed: (cause: unknown) =>
    new PeerError(SyncErrorCode.PEER_LOOKUP_FAILED, `Peer lookup failed: ${describeCause(cause)}`),
  syncTimeout: (timeoutMs: number) =>
    new PeerError(SyncErrorCode.SYNC_TIMEOUT, `No sync response within ${timeoutMs}ms`, { timeoutMs }),

  // Decode
  malformedJson: (cause: unknown) =>
    new DecodeError(SyncErrorCode.MALFORMED_JSON, `Malformed JSON: ${describeCause(cause)}`),
  invalidSnapshot: (field: string, reason: string) =>
    new DecodeError(SyncErrorCode.INVALID_SNAPSHOT, `Invalid snapshot at ${field}: ${reason}`, { field }),
  invalidActionPayload: (path: string, reason: string) =>
    new DecodeError(SyncErrorCode.INVALID_ACTION_PAYLOAD, `Invalid payload for ${path}: ${reason}`, { path }),
  missingDataEntry: (path: string) =>
    new DecodeError(SyncErrorCode.MISSING_DATA_ENTRY, `Data item on ${path} has no data entry`, { path }),
  unknownPath: (path: string) =>
    new DecodeError(SyncErrorCode.UNKNOWN_PATH, `Unknown message path: ${path}`, { path }),

  // Store
  storeReadFailed: (section: string, cause: unknown) =>
    new StoreError(
      SyncErrorCode.STORE_READ_FAILED,
      `Reading ${section} failed: ${describeCause(cause)}`,
      { section }
    ),
  storeWriteFailed: (operation: string, cause: unknown) =>
    new StoreError(
      SyncErrorCode.STORE_WRITE_FAILED,
      `${operation} failed: ${describeCause(cause)}`,
      { operation }
    ),
};

// ============================================================================
// Error Report Helper
// ============================================================================

export interface ErrorReport {
  readonly name: string;
  readonly code: SyncErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

/**
 * Flatten any thrown value into log metadata.
 */
export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof SyncError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      code: SyncErrorCode.UNKNOWN_ERROR,
      message: error.message,
    };
  }

  return {
    name: 'Unknown',
    code: SyncErrorCode.UNKNOWN_ERROR,
    message: String(error),
  };
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}
