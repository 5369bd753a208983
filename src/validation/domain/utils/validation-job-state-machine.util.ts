import { BadRequestException } from '@nestjs/common';
import { ValidationJobState } from '../enums/validation-job-state.enum';

/**
 * Valid transitions:
 * - QUEUED → RUNNING (claim)
 * - RUNNING → SUCCEEDED | FAILED | SKIPPED
 * - RUNNING → RUNNING (an expired claim is taken over)
 * - FAILED → QUEUED (automatic retry while attempts remain)
 *
 * SUCCEEDED and SKIPPED are terminal.
 */
export class ValidationJobStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    ValidationJobState,
    ValidationJobState[]
  > = new Map([
    [ValidationJobState.QUEUED, [ValidationJobState.RUNNING]],
    [
      ValidationJobState.RUNNING,
      [
        ValidationJobState.RUNNING,
        ValidationJobState.SUCCEEDED,
        ValidationJobState.FAILED,
        ValidationJobState.SKIPPED,
      ],
    ],
    [ValidationJobState.FAILED, [ValidationJobState.QUEUED]],
  ]);

  static isValidTransition(
    fromState: ValidationJobState,
    toState: ValidationJobState,
  ): boolean {
    return this.getValidTargetStates(fromState).includes(toState);
  }

  /**
   * @throws BadRequestException if the transition is invalid
   */
  static validateTransition(
    fromState: ValidationJobState,
    toState: ValidationJobState,
  ): void {
    if (!this.isValidTransition(fromState, toState)) {
      throw new BadRequestException(
        `Invalid job state transition: ${fromState} → ${toState}. ` +
          `Valid transitions from ${fromState}: ${this.getValidTargetStates(fromState).join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(fromState: ValidationJobState): ValidationJobState[] {
    return this.VALID_TRANSITIONS.get(fromState) ?? [];
  }

  /**
   * A retried attempt passes FAILED → QUEUED in one update, so a stored job
   * only rests in FAILED once it will not run again.
   */
  static isTerminal(state: ValidationJobState): boolean {
    return (
      state === ValidationJobState.SUCCEEDED ||
      state === ValidationJobState.FAILED ||
      state === ValidationJobState.SKIPPED
    );
  }
}
