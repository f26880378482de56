export { User, UserStatus } from './user.entity';
export {
  Call,
  CallType,
  CallMode,
  CallStatus,
  LIVE_CALL_STATUSES,
  isLiveCallStatus,
} from './call.entity';
export {
  CallParticipant,
  ParticipantRole,
  ParticipantStatus,
  ConnectionQuality,
  participantDurationSeconds,
} from './call-participant.entity';
export { CallInvitation, InvitationStatus } from './call-invitation.entity';
