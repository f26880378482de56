import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Call,
  CallInvitation,
  CallMode,
  CallParticipant,
  CallStatus,
  CallType,
  InvitationStatus,
  ParticipantRole,
  ParticipantStatus,
  isLiveCallStatus,
} from '../entities';
import { InitiateCallDto, UpdateMediaStateDto } from '../dto/call.dto';
import { OutboundFrameType } from '../dto/signaling.dto';
import { KeyedMutex } from '../common/keyed-mutex';
import { ConnectionRegistryService } from '../realtime/connection-registry.service';
import { CALL_STORE, CallHistoryPage, CallStore } from './call.store';
import { CallErrorCode, callError } from './call.errors';
import { IceConfigService } from './ice-config.service';
import { toCallResponse } from './call.mapper';

export interface CallMembership {
  callStatus: CallStatus;
  participantStatus: ParticipantStatus;
}

interface CallOutcome {
  status: CallStatus;
  endedBy: string | null;
  endReason: string | null;
}

interface NewParticipant {
  userId: string;
  role: ParticipantRole;
  status: ParticipantStatus;
  invitedAt: Date;
  joinedAt: Date | null;
  callType: CallType;
}

const UNAVAILABLE_STATUSES: readonly ParticipantStatus[] = [
  ParticipantStatus.DECLINED,
  ParticipantStatus.MISSED,
];

/**
 * Call lifecycle: initiate, answer, decline, end, invite and media state.
 *
 * Every transition on an existing call runs under a per-call lock and is
 * written back with a revision check, so two requests racing on the same
 * call cannot both apply. Events are pushed through the connection registry
 * only after the write has landed.
 */
@Injectable()
export class CallService {
  private readonly logger = new Logger(CallService.name);
  private readonly callLocks = new KeyedMutex();
  private readonly invitationTtlMs: number;

  constructor(
    @Inject(CALL_STORE)
    private readonly callStore: CallStore,
    private readonly registry: ConnectionRegistryService,
    private readonly iceConfigService: IceConfigService,
    private readonly configService: ConfigService,
  ) {
    this.invitationTtlMs =
      this.configService.get<number>('calls.invitationTtlSeconds', 120) * 1000;
  }

  async initiate(initiatorId: string, dto: InitiateCallDto): Promise<Call> {
    const participantIds = Array.from(new Set(dto.participantIds));

    if (participantIds.includes(initiatorId)) {
      throw new BadRequestException(
        callError(CallErrorCode.CANNOT_CALL_SELF, 'Cannot call yourself'),
      );
    }

    const users = await this.callStore.findActiveUsers(participantIds);
    if (users.length !== participantIds.length) {
      throw new NotFoundException(
        callError(
          CallErrorCode.PARTICIPANT_NOT_FOUND,
          'One or more participants not found',
        ),
      );
    }

    for (const participantId of participantIds) {
      const existing = await this.callStore.findLiveDirectCallBetween(
        initiatorId,
        participantId,
      );
      if (existing) {
        throw new ConflictException(
          callError(
            CallErrorCode.ALREADY_IN_CALL,
            `Already in an active call with user ${participantId}`,
          ),
        );
      }
    }

    const callMode =
      participantIds.length > 1 ? CallMode.GROUP : CallMode.ONE_ON_ONE;
    const maxParticipants =
      callMode === CallMode.GROUP ? (dto.maxParticipants ?? null) : null;

    if (
      maxParticipants !== null &&
      participantIds.length + 1 > maxParticipants
    ) {
      throw new BadRequestException(
        callError(
          CallErrorCode.EXCEEDS_MAX_PARTICIPANTS,
          'Exceeds max participants',
        ),
      );
    }

    const now = new Date();
    const call = Object.assign(new Call(), {
      initiatorId,
      callType: dto.callType,
      callMode,
      status: CallStatus.RINGING,
      maxParticipants,
      startedAt: now,
      endedAt: null,
      durationSeconds: null,
      endedBy: null,
      endReason: null,
      metadata: dto.metadata ?? {},
      revision: 0,
      participants: [
        this.buildParticipant({
          userId: initiatorId,
          role: ParticipantRole.INITIATOR,
          status: ParticipantStatus.JOINED,
          invitedAt: now,
          joinedAt: now,
          callType: dto.callType,
        }),
        ...participantIds.map((userId) =>
          this.buildParticipant({
            userId,
            role: ParticipantRole.PARTICIPANT,
            status: ParticipantStatus.RINGING,
            invitedAt: now,
            joinedAt: null,
            callType: dto.callType,
          }),
        ),
      ],
      invitations: [],
    });

    const saved = await this.callStore.createCall(call);

    this.logger.log(
      `Call ${saved.id} (${saved.callMode}, ${saved.callType}) initiated by ${initiatorId} to ${participantIds.join(', ')}`,
    );

    this.registry.addToCall(saved.id, initiatorId);
    this.notifyIncomingCall(saved, participantIds);
    this.publishCallUpdate(saved, [initiatorId]);

    return saved;
  }

  async answer(
    callId: string,
    userId: string,
    metadata?: Record<string, unknown>,
  ): Promise<Call> {
    return this.withCall(callId, async (call) => {
      if (!isLiveCallStatus(call.status)) {
        throw new BadRequestException(
          callError(
            CallErrorCode.INVALID_CALL_STATE,
            `Cannot join call with status: ${call.status}`,
          ),
        );
      }

      const participant = this.findParticipant(call, userId);
      if (!participant) {
        throw new ForbiddenException(
          callError(CallErrorCode.NOT_A_PARTICIPANT, 'Not a participant'),
        );
      }
      if (participant.status !== ParticipantStatus.RINGING) {
        throw new BadRequestException(
          callError(CallErrorCode.CANNOT_ANSWER, 'Cannot answer now'),
        );
      }

      const now = new Date();
      participant.status = ParticipantStatus.JOINED;
      participant.joinedAt = now;
      if (metadata) {
        participant.metadata = { ...participant.metadata, ...metadata };
      }
      this.respondToInvitation(call, userId, InvitationStatus.ACCEPTED, now);

      if (call.status === CallStatus.RINGING) {
        call.status = CallStatus.ACTIVE;
      }

      const saved = await this.callStore.saveCall(call);
      this.logger.log(`User ${userId} answered call ${callId}`);

      this.registry.addToCall(callId, userId);
      this.publishTransition(saved);
      return saved;
    });
  }

  async decline(
    callId: string,
    userId: string,
    reason = 'declined',
  ): Promise<Call> {
    return this.withCall(callId, async (call) => {
      const participant = this.findParticipant(call, userId);
      if (!participant || participant.status !== ParticipantStatus.RINGING) {
        throw new BadRequestException(
          callError(CallErrorCode.CANNOT_DECLINE, 'Cannot decline'),
        );
      }

      const now = new Date();
      participant.status = ParticipantStatus.DECLINED;
      participant.metadata = { ...participant.metadata, declineReason: reason };
      this.respondToInvitation(call, userId, InvitationStatus.DECLINED, now);

      if (call.callMode === CallMode.ONE_ON_ONE) {
        this.finishCall(
          call,
          { status: CallStatus.DECLINED, endedBy: userId, endReason: null },
          now,
        );
      } else if (this.allInviteesUnavailable(call)) {
        this.finishCall(
          call,
          {
            status: CallStatus.DECLINED,
            endedBy: null,
            endReason: 'all_declined',
          },
          now,
        );
      }

      const saved = await this.callStore.saveCall(call);
      this.logger.log(
        `User ${userId} declined call ${callId} (call is ${saved.status})`,
      );

      this.registry.removeFromCall(callId, userId);
      this.publishTransition(saved);
      return saved;
    });
  }

  async end(
    callId: string,
    userId: string,
    reason = 'user_hangup',
  ): Promise<Call> {
    return this.withCall(callId, async (call) => {
      const participant = this.findParticipant(call, userId);
      if (!participant) {
        throw new ForbiddenException(
          callError(CallErrorCode.NOT_A_PARTICIPANT, 'Not a participant'),
        );
      }
      if (!isLiveCallStatus(call.status)) {
        throw new BadRequestException(
          callError(
            CallErrorCode.CALL_ALREADY_ENDED,
            `Call already finished with status: ${call.status}`,
          ),
        );
      }

      const now = new Date();
      if (participant.status === ParticipantStatus.JOINED) {
        participant.status = ParticipantStatus.LEFT;
        participant.leftAt = now;
      }

      if (call.callMode === CallMode.ONE_ON_ONE) {
        call.participants
          .filter(
            (other) =>
              other.userId !== userId &&
              other.status === ParticipantStatus.JOINED,
          )
          .forEach((other) => {
            other.status = ParticipantStatus.LEFT;
            other.leftAt = now;
          });
        this.finishCall(
          call,
          { status: CallStatus.ENDED, endedBy: userId, endReason: reason },
          now,
        );
      } else {
        const othersJoined = call.participants.some(
          (other) =>
            other.userId !== userId &&
            other.status === ParticipantStatus.JOINED,
        );
        if (!othersJoined) {
          this.finishCall(
            call,
            { status: CallStatus.ENDED, endedBy: userId, endReason: 'all_left' },
            now,
          );
        }
      }

      const saved = await this.callStore.saveCall(call);
      this.logger.log(
        `User ${userId} left call ${callId} (call is ${saved.status})`,
      );

      this.registry.removeFromCall(callId, userId);
      this.publishTransition(saved);
      return saved;
    });
  }

  async inviteToCall(
    callId: string,
    inviterId: string,
    userIds: string[],
  ): Promise<CallParticipant[]> {
    return this.withCall(callId, async (call) => {
      if (
        call.callMode !== CallMode.GROUP ||
        call.status !== CallStatus.ACTIVE
      ) {
        throw new BadRequestException(
          callError(
            CallErrorCode.INVALID_CALL_STATE,
            'Invalid call state for invite',
          ),
        );
      }

      const inviter = this.findParticipant(call, inviterId);
      if (!inviter || inviter.status !== ParticipantStatus.JOINED) {
        throw new ForbiddenException(
          callError(
            CallErrorCode.INVITER_NOT_ACTIVE,
            'Only active participants can invite',
          ),
        );
      }

      const newUserIds = Array.from(new Set(userIds)).filter(
        (userId) => !this.findParticipant(call, userId),
      );
      if (newUserIds.length === 0) {
        return [];
      }

      if (call.maxParticipants !== null) {
        const occupied = call.participants.filter(
          (participant) =>
            participant.status === ParticipantStatus.RINGING ||
            participant.status === ParticipantStatus.JOINED,
        ).length;
        if (occupied + newUserIds.length > call.maxParticipants) {
          throw new BadRequestException(
            callError(
              CallErrorCode.EXCEEDS_MAX_PARTICIPANTS,
              'Exceeds max participants',
            ),
          );
        }
      }

      const users = await this.callStore.findActiveUsers(newUserIds);
      if (users.length !== newUserIds.length) {
        throw new NotFoundException(
          callError(
            CallErrorCode.PARTICIPANT_NOT_FOUND,
            'One or more participants not found',
          ),
        );
      }

      const now = new Date();
      const expiresAt = new Date(now.getTime() + this.invitationTtlMs);
      const existingUserIds = call.participants.map(
        (participant) => participant.userId,
      );

      for (const userId of newUserIds) {
        const participant = this.buildParticipant({
          userId,
          role: ParticipantRole.PARTICIPANT,
          status: ParticipantStatus.RINGING,
          invitedAt: now,
          joinedAt: null,
          callType: call.callType,
        });
        participant.callId = call.id;
        call.participants.push(participant);

        call.invitations = [
          ...(call.invitations ?? []),
          Object.assign(new CallInvitation(), {
            callId: call.id,
            invitedUserId: userId,
            invitedBy: inviterId,
            status: InvitationStatus.PENDING,
            invitedAt: now,
            respondedAt: null,
            expiresAt,
          }),
        ];
      }

      const saved = await this.callStore.saveCall(call);
      this.logger.log(
        `User ${inviterId} invited ${newUserIds.join(', ')} to call ${callId}`,
      );

      this.notifyIncomingCall(saved, newUserIds);
      this.publishCallUpdate(saved, existingUserIds);

      return saved.participants.filter((participant) =>
        newUserIds.includes(participant.userId),
      );
    });
  }

  async updateMediaState(
    callId: string,
    userId: string,
    dto: UpdateMediaStateDto,
  ): Promise<CallParticipant> {
    return this.withCall(callId, async (call) => {
      const participant = this.findParticipant(call, userId);
      if (!participant || participant.status !== ParticipantStatus.JOINED) {
        throw new NotFoundException(
          callError(
            CallErrorCode.PARTICIPANT_NOT_JOINED,
            'Participant not found',
          ),
        );
      }

      if (typeof dto.isMuted === 'boolean') {
        participant.isMuted = dto.isMuted;
      }
      if (typeof dto.isVideoEnabled === 'boolean') {
        participant.isVideoEnabled = dto.isVideoEnabled;
      }
      if (typeof dto.isScreenSharing === 'boolean') {
        participant.isScreenSharing = dto.isScreenSharing;
      }
      if (dto.connectionQuality) {
        participant.connectionQuality = dto.connectionQuality;
      }

      const saved = await this.callStore.saveCall(call);
      const updated = this.findParticipant(saved, userId) ?? participant;

      this.registry.sendToCall(
        {
          type: OutboundFrameType.MEDIA_STATE_UPDATE,
          call_id: callId,
          user_id: userId,
          is_muted: updated.isMuted,
          is_video_enabled: updated.isVideoEnabled,
          is_screen_sharing: updated.isScreenSharing,
        },
        callId,
        userId,
      );

      return updated;
    });
  }

  async findOne(callId: string, userId: string): Promise<Call> {
    const call = await this.callStore.findCall(callId);
    if (!call) {
      throw new NotFoundException(
        callError(CallErrorCode.CALL_NOT_FOUND, 'Call not found'),
      );
    }
    if (!this.findParticipant(call, userId)) {
      throw new ForbiddenException(
        callError(CallErrorCode.NOT_A_PARTICIPANT, 'Access denied'),
      );
    }
    return call;
  }

  async history(
    userId: string,
    limit = 50,
    offset = 0,
  ): Promise<CallHistoryPage> {
    return this.callStore.findHistory(userId, limit, offset);
  }

  async findActive(userId: string): Promise<Call[]> {
    return this.callStore.findLiveCallsForUser(userId);
  }

  /**
   * Hands the user's durable membership to `task` while the call's lock is
   * held. No transition on the call commits between the read and the task.
   */
  async withMembership<T>(
    callId: string,
    userId: string,
    task: (membership: CallMembership | null) => T,
  ): Promise<T> {
    return this.callLocks.runExclusive(callId, async () =>
      task(await this.getMembership(callId, userId)),
    );
  }

  /** Durable membership of a user in a call, or null when there is none. */
  async getMembership(
    callId: string,
    userId: string,
  ): Promise<CallMembership | null> {
    const call = await this.callStore.findCall(callId);
    const participant = call ? this.findParticipant(call, userId) : undefined;
    if (!call || !participant) {
      return null;
    }
    return { callStatus: call.status, participantStatus: participant.status };
  }

  /**
   * Marks participants that have been ringing since before `cutoff` as
   * missed. A call nobody picked up ends as missed.
   */
  async expireUnanswered(callId: string, cutoff: Date): Promise<Call> {
    return this.withCall(callId, async (call) => {
      if (!isLiveCallStatus(call.status)) {
        return call;
      }

      const stale = call.participants.filter(
        (participant) =>
          participant.status === ParticipantStatus.RINGING &&
          participant.invitedAt.getTime() <= cutoff.getTime(),
      );
      if (stale.length === 0) {
        return call;
      }

      const now = new Date();
      stale.forEach((participant) => {
        participant.status = ParticipantStatus.MISSED;
        this.respondToInvitation(
          call,
          participant.userId,
          InvitationStatus.EXPIRED,
          null,
        );
      });

      if (
        call.status === CallStatus.RINGING &&
        (call.callMode === CallMode.ONE_ON_ONE ||
          this.allInviteesUnavailable(call))
      ) {
        this.finishCall(
          call,
          { status: CallStatus.MISSED, endedBy: null, endReason: 'no_answer' },
          now,
        );
      }

      const saved = await this.callStore.saveCall(call);
      this.logger.log(
        `Call ${callId}: ${stale.length} participants missed (call is ${saved.status})`,
      );

      this.publishTransition(saved);
      return saved;
    });
  }

  private async withCall<T>(
    callId: string,
    operation: (call: Call) => Promise<T>,
  ): Promise<T> {
    return this.callLocks.runExclusive(callId, async () => {
      const call = await this.callStore.findCall(callId);
      if (!call) {
        throw new NotFoundException(
          callError(CallErrorCode.CALL_NOT_FOUND, 'Call not found'),
        );
      }
      this.expireStaleInvitations(call, new Date());
      return operation(call);
    });
  }

  private findParticipant(
    call: Call,
    userId: string,
  ): CallParticipant | undefined {
    return call.participants.find(
      (participant) => participant.userId === userId,
    );
  }

  private buildParticipant(fields: NewParticipant): CallParticipant {
    return Object.assign(new CallParticipant(), {
      userId: fields.userId,
      role: fields.role,
      status: fields.status,
      invitedAt: fields.invitedAt,
      joinedAt: fields.joinedAt,
      leftAt: null,
      isMuted: false,
      isVideoEnabled: fields.callType === CallType.VIDEO,
      isScreenSharing: false,
      connectionQuality: null,
      metadata: {},
    });
  }

  private allInviteesUnavailable(call: Call): boolean {
    return call.participants
      .filter((participant) => participant.role === ParticipantRole.PARTICIPANT)
      .every((participant) => UNAVAILABLE_STATUSES.includes(participant.status));
  }

  private respondToInvitation(
    call: Call,
    userId: string,
    status: InvitationStatus,
    respondedAt: Date | null,
  ): void {
    const invitation = (call.invitations ?? []).find(
      (candidate) =>
        candidate.invitedUserId === userId &&
        candidate.status === InvitationStatus.PENDING,
    );
    if (invitation) {
      invitation.status = status;
      invitation.respondedAt = respondedAt;
    }
  }

  // Pending invitations past their deadline are expired whenever the call
  // is loaded for a write, so a save never resurrects a swept invitation.
  private expireStaleInvitations(call: Call, now: Date): void {
    (call.invitations ?? []).forEach((invitation) => {
      if (
        invitation.status === InvitationStatus.PENDING &&
        invitation.expiresAt &&
        invitation.expiresAt.getTime() < now.getTime()
      ) {
        invitation.status = InvitationStatus.EXPIRED;
      }
    });
  }

  private finishCall(call: Call, outcome: CallOutcome, now: Date): void {
    call.status = outcome.status;
    call.endedAt = now;
    call.endedBy = outcome.endedBy;
    call.endReason = outcome.endReason;

    const answeredAt = call.participants
      .filter(
        (participant) =>
          participant.role === ParticipantRole.PARTICIPANT &&
          participant.joinedAt,
      )
      .map((participant) => participant.joinedAt?.getTime() ?? now.getTime())
      .reduce<number | null>(
        (earliest, joinedAt) =>
          earliest === null ? joinedAt : Math.min(earliest, joinedAt),
        null,
      );
    call.durationSeconds =
      answeredAt === null
        ? null
        : Math.max(0, Math.floor((now.getTime() - answeredAt) / 1000));

    call.participants
      .filter((participant) => participant.status === ParticipantStatus.RINGING)
      .forEach((participant) => {
        participant.status = ParticipantStatus.MISSED;
      });
    (call.invitations ?? [])
      .filter((invitation) => invitation.status === InvitationStatus.PENDING)
      .forEach((invitation) => {
        invitation.status = InvitationStatus.EXPIRED;
      });
  }

  private collectCallRecipients(call: Call): Set<string> {
    const recipients = new Set<string>([call.initiatorId]);
    call.participants.forEach((participant) =>
      recipients.add(participant.userId),
    );
    return recipients;
  }

  private notifyIncomingCall(call: Call, userIds: string[]): void {
    const payload = toCallResponse(call);
    const iceServers = this.iceConfigService.iceServers;

    userIds.forEach((userId) => {
      const delivered = this.registry.sendPersonalMessage(
        {
          type: OutboundFrameType.INCOMING_CALL,
          call_id: call.id,
          call: payload,
          ice_servers: iceServers,
        },
        userId,
      );
      if (delivered === 0) {
        this.logger.debug(
          `User ${userId} is offline, incoming call ${call.id} not pushed`,
        );
      }
    });
  }

  private publishCallUpdate(
    call: Call,
    recipients: Iterable<string> = this.collectCallRecipients(call),
  ): void {
    const payload = toCallResponse(call);
    new Set(recipients).forEach((userId) => {
      this.registry.sendPersonalMessage(
        {
          type: OutboundFrameType.CALL_UPDATED,
          call_id: call.id,
          call: payload,
        },
        userId,
      );
    });
  }

  private publishTransition(call: Call): void {
    this.publishCallUpdate(call);

    if (isLiveCallStatus(call.status)) {
      return;
    }

    this.collectCallRecipients(call).forEach((userId) => {
      this.registry.sendPersonalMessage(
        {
          type: OutboundFrameType.CALL_ENDED,
          call_id: call.id,
          status: call.status,
          reason: call.endReason,
          ended_by: call.endedBy,
        },
        userId,
      );
    });
    this.registry.clearCall(call.id);
  }
}
