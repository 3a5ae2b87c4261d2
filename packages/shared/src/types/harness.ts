/** Fully-qualified reference to exactly one executable test case (e.g. a pytest nodeid). */
export type TestIdentifier = string;

/** Which observed outcome counts as a match for a batch of tests. */
export type ExpectationPolicy = 'expect-fail' | 'expect-pass';

/**
 * An already-resolved execution environment.
 * Owned by the environment provider; other components only reference it.
 */
export interface EnvironmentHandle {
  readonly name: string;
  /** Absolute path of the environment root */
  readonly path: string;
}

/** Unified-diff text plus the direction it should be applied in. */
export interface PatchPayload {
  readonly text: string;
  readonly reverse: boolean;
}

/** Revision captured before any mutation; consumed once by the restore step. */
export interface RevisionSnapshot {
  readonly revision: string;
  readonly capturedAt: string;
}

/** Diagnostics of one test invocation. */
export interface TestRunArtifact {
  testId: TestIdentifier;
  command: string[];
  /** `null` when the process never produced an exit status */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  /** Infrastructure failure that prevented a normal run */
  error?: string;
  logPath: string;
}

export interface TestVerdict {
  policy: ExpectationPolicy;
  results: ReadonlyMap<TestIdentifier, boolean>;
  artifacts: ReadonlyMap<TestIdentifier, TestRunArtifact>;
}

export type VerdictRecord = Record<TestIdentifier, boolean>;

export interface SessionSummary {
  instanceId?: string;
  defect: VerdictRecord;
  baseline: VerdictRecord;
  repair?: VerdictRecord;
}

export function verdictToRecord(verdict: TestVerdict): VerdictRecord {
  return Object.fromEntries(verdict.results);
}

export function allMatched(record: VerdictRecord): boolean {
  return Object.values(record).every(Boolean);
}
