/**
 * Transfer state machine.
 *
 * pending -> in_progress -> completed, or pending/in_progress -> failed.
 * Invalid transitions produce typed errors.
 */

import { TransferStatus, VALID_TRANSFER_TRANSITIONS } from '../domain/transfer';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a transfer state transition. */
export function transitionTransferStatus(
  current: TransferStatus,
  target: TransferStatus,
): TransitionResult<TransferStatus> {
  const validTargets = VALID_TRANSFER_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: `Invalid transfer state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a transfer status is terminal. */
export function isTerminalTransferStatus(status: TransferStatus): boolean {
  return status === TransferStatus.Completed || status === TransferStatus.Failed;
}
