/**
 * Error thrown when a state machine is asked for a transition its table does not allow
 */
export class InvalidStateTransitionError extends Error {
  constructor(currentState: string, targetState: string, subject = 'state') {
    super(`Invalid ${subject} transition from '${currentState}' to '${targetState}'`);
    this.name = 'InvalidStateTransitionError';
  }
}
