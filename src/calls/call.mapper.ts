import {
  Call,
  CallParticipant,
  ParticipantStatus,
  User,
  participantDurationSeconds,
} from '../entities';
import {
  CallHistoryItemDto,
  CallParticipantResponseDto,
  CallResponseDto,
  UserCallInfoDto,
} from '../dto/call.dto';

const buildDisplayName = (user: User | undefined | null): string => {
  if (!user) {
    return 'Unknown user';
  }

  const name = `${user.firstName ?? ''} ${user.lastName ?? ''}`.trim();
  if (name.length > 0) {
    return name;
  }

  return user.email ?? 'Unknown user';
};

const toUserInfo = (user: User | undefined | null): UserCallInfoDto | undefined =>
  user
    ? {
        id: user.id,
        firstName: user.firstName,
        lastName: user.lastName,
        profilePicture: user.profilePicture ?? null,
      }
    : undefined;

export const toParticipantResponse = (
  participant: CallParticipant,
  now: Date = new Date(),
): CallParticipantResponseDto => ({
  id: participant.id,
  userId: participant.userId,
  user: toUserInfo(participant.user),
  role: participant.role,
  status: participant.status,
  invitedAt: participant.invitedAt,
  joinedAt: participant.joinedAt ?? null,
  leftAt: participant.leftAt ?? null,
  isMuted: participant.isMuted,
  isVideoEnabled: participant.isVideoEnabled,
  isScreenSharing: participant.isScreenSharing,
  connectionQuality: participant.connectionQuality ?? null,
  durationSeconds: participantDurationSeconds(participant, now),
});

export const toCallResponse = (
  call: Call,
  now: Date = new Date(),
): CallResponseDto => {
  const participants = call.participants ?? [];

  return {
    id: call.id,
    initiatorId: call.initiatorId,
    initiator: toUserInfo(call.initiator),
    callType: call.callType,
    callMode: call.callMode,
    status: call.status,
    maxParticipants: call.maxParticipants ?? null,
    startedAt: call.startedAt,
    endedAt: call.endedAt ?? null,
    durationSeconds: call.durationSeconds ?? null,
    endedBy: call.endedBy ?? null,
    endReason: call.endReason ?? null,
    metadata: call.metadata ?? {},
    participants: participants.map((participant) =>
      toParticipantResponse(participant, now),
    ),
    activeParticipantCount: participants.filter(
      (participant) => participant.status === ParticipantStatus.JOINED,
    ).length,
    createdAt: call.createdAt,
    updatedAt: call.updatedAt,
  };
};

export const toHistoryItem = (
  call: Call,
  viewerId: string,
): CallHistoryItemDto => {
  const participants = call.participants ?? [];
  const viewer = participants.find(
    (participant) => participant.userId === viewerId,
  );

  return {
    id: call.id,
    callType: call.callType,
    callMode: call.callMode,
    status: call.status,
    startedAt: call.startedAt,
    endedAt: call.endedAt ?? null,
    durationSeconds: call.durationSeconds ?? null,
    initiatorId: call.initiatorId,
    initiatorName: buildDisplayName(call.initiator),
    participantCount: participants.length,
    participantNames: participants
      .filter((participant) => participant.userId !== viewerId)
      .map((participant) => buildDisplayName(participant.user)),
    userRole: viewer?.role ?? 'unknown',
  };
};
