/**
 * Lifecycle of a session.
 *
 * - UNOPENED: constructed, `open` not yet called.
 * - READING: opened on an existing file.
 * - WRITING: opened to produce a new file.
 * - CLOSED: released; terminal.
 */
export enum SessionState {
  UNOPENED,
  READING,
  WRITING,
  CLOSED,
}

export class SessionStateMachine {
  private _state: SessionState = SessionState.UNOPENED;

  public get state(): SessionState {
    return this._state;
  }

  public get isOpen(): boolean {
    return this._state === SessionState.READING || this._state === SessionState.WRITING;
  }

  /**
   * Moves to `newState`.
   * @returns false, leaving the state unchanged, if the transition is not allowed.
   */
  public transition(newState: SessionState): boolean {
    if (!this.isValidTransition(newState)) return false;
    this._state = newState;
    return true;
  }

  private isValidTransition(newState: SessionState): boolean {
    switch (this._state) {
      case SessionState.UNOPENED:
        return newState !== SessionState.UNOPENED;
      case SessionState.READING:
      case SessionState.WRITING:
        return newState === SessionState.CLOSED;
      case SessionState.CLOSED:
        return false;
      default:
        return false;
    }
  }
}
