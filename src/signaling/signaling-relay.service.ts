import { HttpException, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import {
  InboundFrameType,
  OutboundFrame,
  OutboundFrameType,
  SignalingErrorCode,
  SignalingFrameDto,
  isInboundFrameType,
} from '../dto/signaling.dto';
import {
  ConnectionRegistryService,
  RealtimeConnection,
} from '../realtime/connection-registry.service';
import { CallMembership, CallService } from '../calls/call.service';
import { ParticipantStatus, isLiveCallStatus } from '../entities';

const describeError = (error: unknown): string => {
  if (error instanceof HttpException) {
    return `${error.getStatus()} ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
};

const collectConstraints = (errors: ValidationError[]): string[] =>
  errors.flatMap((error) => Object.values(error.constraints ?? {}));

/**
 * Handles one client frame at a time: parse, validate, authorize against the
 * durable participant state, then forward through the registry.
 *
 * Errors are only ever sent back to the connection the frame came from.
 */
@Injectable()
export class SignalingRelayService {
  private readonly logger = new Logger(SignalingRelayService.name);

  constructor(
    private readonly registry: ConnectionRegistryService,
    private readonly callService: CallService,
  ) {}

  async handleFrame(
    connection: RealtimeConnection,
    userId: string,
    raw: unknown,
  ): Promise<void> {
    try {
      await this.dispatch(connection, userId, raw);
    } catch (error) {
      this.logger.error(
        `Frame from user ${userId} on ${connection.id} failed: ${describeError(error)}`,
      );
      this.replyError(
        connection,
        SignalingErrorCode.INTERNAL_ERROR,
        'Failed to process message',
      );
    }
  }

  /** Drops an offline user from every signaling mesh and tells the others. */
  handleUserOffline(userId: string): void {
    this.registry.getCallsForUser(userId).forEach((callId) => {
      this.registry.removeFromCall(callId, userId);
      this.registry.sendToCall(
        {
          type: OutboundFrameType.PARTICIPANT_LEFT,
          call_id: callId,
          user_id: userId,
          reason: 'disconnected',
        },
        callId,
        userId,
      );
      this.logger.log(`User ${userId} dropped from call ${callId} signaling`);
    });
  }

  private async dispatch(
    connection: RealtimeConnection,
    userId: string,
    raw: unknown,
  ): Promise<void> {
    const frame = await this.readFrame(connection, raw);
    if (!frame) {
      return;
    }

    const { type, call_id: callId } = frame;
    if (!isInboundFrameType(type)) {
      this.replyError(
        connection,
        SignalingErrorCode.UNKNOWN_TYPE,
        `Unknown message type: ${type}`,
        callId,
      );
      return;
    }

    const payloadProblem = this.checkPayload(type, frame);
    if (payloadProblem) {
      this.replyError(
        connection,
        SignalingErrorCode.INVALID_FRAME,
        payloadProblem,
        callId,
      );
      return;
    }

    // Authorized and routed under the call's lock, after any pending transition.
    await this.callService.withMembership(callId, userId, (membership) => {
      if (!this.authorize(connection, type, callId, membership)) {
        return;
      }
      if (type !== InboundFrameType.LEAVE_CALL) {
        this.registry.addToCall(callId, userId);
      }
      this.route(connection, userId, type, frame);
    });
  }

  private route(
    connection: RealtimeConnection,
    userId: string,
    type: InboundFrameType,
    frame: SignalingFrameDto,
  ): void {
    const callId = frame.call_id;
    switch (type) {
      case InboundFrameType.OFFER:
      case InboundFrameType.ANSWER:
        this.forward(connection, userId, frame, {
          type,
          call_id: callId,
          from_user_id: userId,
          sdp: frame.sdp,
        });
        return;
      case InboundFrameType.ICE_CANDIDATE:
        this.forward(connection, userId, frame, {
          type,
          call_id: callId,
          from_user_id: userId,
          candidate: frame.candidate,
        });
        return;
      case InboundFrameType.MEDIA_STATE_UPDATE:
        this.registry.sendToCall(
          {
            type: OutboundFrameType.MEDIA_STATE_UPDATE,
            call_id: callId,
            user_id: userId,
            ...this.mediaFlags(frame),
          },
          callId,
          userId,
        );
        return;
      case InboundFrameType.JOIN_CALL:
        this.registry.sendToCall(
          {
            type: OutboundFrameType.PARTICIPANT_JOINED,
            call_id: callId,
            user_id: userId,
          },
          callId,
          userId,
        );
        return;
      case InboundFrameType.LEAVE_CALL:
        this.registry.removeFromCall(callId, userId);
        this.registry.sendToCall(
          {
            type: OutboundFrameType.PARTICIPANT_LEFT,
            call_id: callId,
            user_id: userId,
          },
          callId,
          userId,
        );
        return;
    }
  }

  private async readFrame(
    connection: RealtimeConnection,
    raw: unknown,
  ): Promise<SignalingFrameDto | null> {
    let value: unknown = raw;
    if (typeof raw === 'string') {
      try {
        value = JSON.parse(raw);
      } catch {
        this.replyError(connection, SignalingErrorCode.INVALID_JSON, 'Invalid JSON');
        return null;
      }
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      this.replyError(
        connection,
        SignalingErrorCode.INVALID_FRAME,
        'Message must be a JSON object',
      );
      return null;
    }

    if (!('type' in value) || !('call_id' in value)) {
      this.replyError(
        connection,
        SignalingErrorCode.INVALID_FRAME,
        'Missing required fields: type, call_id',
      );
      return null;
    }

    const frame = plainToInstance(SignalingFrameDto, value);
    const errors = await validate(frame);
    if (errors.length > 0) {
      this.replyError(
        connection,
        SignalingErrorCode.INVALID_FRAME,
        collectConstraints(errors).join('; '),
      );
      return null;
    }

    return frame;
  }

  private checkPayload(
    type: InboundFrameType,
    frame: SignalingFrameDto,
  ): string | null {
    if (
      (type === InboundFrameType.OFFER || type === InboundFrameType.ANSWER) &&
      !frame.sdp
    ) {
      return `${type} requires sdp`;
    }
    if (type === InboundFrameType.ICE_CANDIDATE && !frame.candidate) {
      return 'ice-candidate requires candidate';
    }
    return null;
  }

  private authorize(
    connection: RealtimeConnection,
    type: InboundFrameType,
    callId: string,
    membership: CallMembership | null,
  ): boolean {
    if (!membership) {
      this.replyError(
        connection,
        SignalingErrorCode.NOT_A_PARTICIPANT,
        'Not a participant of this call',
        callId,
      );
      return false;
    }

    if (type === InboundFrameType.LEAVE_CALL) {
      return true;
    }

    if (
      !isLiveCallStatus(membership.callStatus) ||
      membership.participantStatus !== ParticipantStatus.JOINED
    ) {
      this.replyError(
        connection,
        SignalingErrorCode.NOT_JOINED,
        'Join the call before signaling',
        callId,
      );
      return false;
    }

    return true;
  }

  private forward(
    connection: RealtimeConnection,
    userId: string,
    frame: SignalingFrameDto,
    outbound: OutboundFrame,
  ): void {
    const target = frame.to_user_id;
    if (!target) {
      this.registry.sendToCall(outbound, frame.call_id, userId);
      return;
    }

    const delivery = this.registry.sendToPeer(
      outbound,
      userId,
      target,
      frame.call_id,
    );
    if (delivery !== 'delivered') {
      this.replyError(
        connection,
        SignalingErrorCode.PEER_UNREACHABLE,
        `User ${target} is not reachable in this call`,
        frame.call_id,
        { to_user_id: target },
      );
    }
  }

  private mediaFlags(frame: SignalingFrameDto): Record<string, boolean> {
    const flags: Record<string, boolean> = {};
    if (frame.is_muted !== undefined) {
      flags.is_muted = frame.is_muted;
    }
    if (frame.is_video_enabled !== undefined) {
      flags.is_video_enabled = frame.is_video_enabled;
    }
    if (frame.is_screen_sharing !== undefined) {
      flags.is_screen_sharing = frame.is_screen_sharing;
    }
    return flags;
  }

  private replyError(
    connection: RealtimeConnection,
    code: SignalingErrorCode,
    message: string,
    callId?: string,
    extra: Record<string, unknown> = {},
  ): void {
    const frame: OutboundFrame = {
      type: OutboundFrameType.ERROR,
      code,
      message,
      ...extra,
    };
    if (callId) {
      frame.call_id = callId;
    }

    try {
      connection.send(frame);
    } catch (error) {
      this.logger.warn(
        `Could not deliver ${code} to ${connection.id}: ${describeError(error)}`,
      );
      this.registry.disconnect(connection.id);
    }
  }
}
