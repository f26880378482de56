import { ConflictException } from '@nestjs/common';

export const CallErrorCode = {
  CANNOT_CALL_SELF: 'cannot_call_self',
  PARTICIPANT_NOT_FOUND: 'participant_not_found',
  ALREADY_IN_CALL: 'already_in_call',
  CALL_NOT_FOUND: 'call_not_found',
  NOT_A_PARTICIPANT: 'not_a_participant',
  INVALID_CALL_STATE: 'invalid_call_state',
  CALL_ALREADY_ENDED: 'call_already_ended',
  CANNOT_ANSWER: 'cannot_answer',
  CANNOT_DECLINE: 'cannot_decline',
  INVITER_NOT_ACTIVE: 'inviter_not_active',
  EXCEEDS_MAX_PARTICIPANTS: 'exceeds_max_participants',
  PARTICIPANT_NOT_JOINED: 'participant_not_joined',
  CALL_CONFLICT: 'call_conflict',
} as const;

export type CallErrorCode = (typeof CallErrorCode)[keyof typeof CallErrorCode];

/** Body shape shared by every call-control rejection. */
export interface CallErrorBody {
  code: CallErrorCode;
  message: string;
}

export const callError = (
  code: CallErrorCode,
  message: string,
): CallErrorBody => ({ code, message });

export const callConflict = (callId: string): ConflictException =>
  new ConflictException(
    callError(
      CallErrorCode.CALL_CONFLICT,
      `Call ${callId} was modified concurrently, retry the operation`,
    ),
  );
