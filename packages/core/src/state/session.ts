import { SessionStateError } from '@faultline/shared';

export const SESSION_STATES = [
  'UNINITIALIZED',
  'SNAPSHOTTED',
  'SWITCHED',
  'PATCHED',
  'VERIFIED',
  'RESTORED',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

const rank = (state: SessionState) => SESSION_STATES.indexOf(state);

/**
 * Lifecycle of one verification session.
 *
 * States only move forward. Steps after SNAPSHOTTED may be skipped (no base
 * revision to switch to, a patch that was never applied), and RESTORED is
 * reachable from any state once a revision has been captured.
 */
export class SessionStateMachine {
  private current: SessionState = 'UNINITIALIZED';
  readonly history: SessionState[] = ['UNINITIALIZED'];

  get state(): SessionState {
    return this.current;
  }

  /** A revision was captured and has not been restored yet. */
  get needsRestore(): boolean {
    return rank(this.current) >= rank('SNAPSHOTTED') && this.current !== 'RESTORED';
  }

  canTransition(to: SessionState): boolean {
    if (this.current === 'RESTORED' || to === 'UNINITIALIZED') return false;
    if (to === 'RESTORED') return this.needsRestore;
    if (this.current === 'UNINITIALIZED') return to === 'SNAPSHOTTED';
    return rank(to) > rank(this.current);
  }

  transition(to: SessionState): void {
    if (!this.canTransition(to)) {
      throw new SessionStateError(`Illegal session transition ${this.current} -> ${to}`, {
        details: { from: this.current, to },
      });
    }
    this.current = to;
    this.history.push(to);
  }
}
