import type { ExpectationPolicy } from './harness';

/**
 * Base interface for all harness events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the verification session */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a verification session starts.
 */
export interface SessionStarted extends BaseEvent {
  type: 'SessionStarted';
  payload: {
    repoRoot: string;
    instanceId?: string;
    environment: string;
  };
}

/** Emitted once the pre-run revision has been recorded */
export interface RevisionCaptured extends BaseEvent {
  type: 'RevisionCaptured';
  payload: {
    revision: string;
  };
}

/** Emitted after the working tree has been moved to the base revision */
export interface RevisionSwitched extends BaseEvent {
  type: 'RevisionSwitched';
  payload: {
    revision: string;
    /** Whether local changes were stashed before the switch */
    stashed: boolean;
    /** Whether re-applying the stash succeeded (undefined when nothing was stashed) */
    stashRestored?: boolean;
  };
}

/** Emitted for every patch strategy that was tried */
export interface PatchStrategyAttempted extends BaseEvent {
  type: 'PatchStrategyAttempted';
  payload: {
    strategy: string;
    reverse: boolean;
    exitCode: number | null;
    succeeded: boolean;
    durationMs: number;
    error?: string;
  };
}

/** Emitted when a strategy applied the patch */
export interface PatchApplied extends BaseEvent {
  type: 'PatchApplied';
  payload: {
    strategy: string;
    reverse: boolean;
    attempts: number;
    filePaths: string[];
  };
}

/** Emitted when every strategy failed */
export interface PatchExhausted extends BaseEvent {
  type: 'PatchExhausted';
  payload: {
    reverse: boolean;
    strategies: string[];
  };
}

/** Emitted once per test identifier */
export interface TestVerified extends BaseEvent {
  type: 'TestVerified';
  payload: {
    testId: string;
    policy: ExpectationPolicy;
    exitCode: number | null;
    matched: boolean;
    durationMs: number;
    logPath: string;
    error?: string;
  };
}

/** Emitted at the end of a verification batch */
export interface VerificationFinished extends BaseEvent {
  type: 'VerificationFinished';
  payload: {
    policy: ExpectationPolicy;
    total: number;
    matched: number;
    mismatched: string[];
  };
}

/** Emitted after the cleanup step put the repository back */
export interface RevisionRestored extends BaseEvent {
  type: 'RevisionRestored';
  payload: {
    revision: string;
    succeeded: boolean;
    error?: string;
  };
}

/** Emitted when a session finishes, successfully or not */
export interface SessionFinished extends BaseEvent {
  type: 'SessionFinished';
  payload: {
    success: boolean;
    exitCode: number;
    primaryError?: string;
    cleanupError?: string;
  };
}

export type HarnessEvent =
  | SessionStarted
  | RevisionCaptured
  | RevisionSwitched
  | PatchStrategyAttempted
  | PatchApplied
  | PatchExhausted
  | TestVerified
  | VerificationFinished
  | RevisionRestored
  | SessionFinished;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; spread into the event literal.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventMeta(runId), type: 'RevisionCaptured', payload: { revision } });
 * ```
 */
export function eventMeta(runId: string): { schemaVersion: number; timestamp: string; runId: string } {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
