import {
  IsBoolean,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
} from 'class-validator';

export const SIGNAL_EVENT = 'signal';

export const InboundFrameType = {
  OFFER: 'offer',
  ANSWER: 'answer',
  ICE_CANDIDATE: 'ice-candidate',
  MEDIA_STATE_UPDATE: 'media-state-update',
  JOIN_CALL: 'join-call',
  LEAVE_CALL: 'leave-call',
} as const;

export type InboundFrameType =
  (typeof InboundFrameType)[keyof typeof InboundFrameType];

export const OutboundFrameType = {
  CONNECTED: 'connected',
  ERROR: 'error',
  INCOMING_CALL: 'incoming-call',
  CALL_UPDATED: 'call-updated',
  CALL_ENDED: 'call-ended',
  PARTICIPANT_JOINED: 'participant-joined',
  PARTICIPANT_LEFT: 'participant-left',
  MEDIA_STATE_UPDATE: 'media-state-update',
} as const;

export const SignalingErrorCode = {
  INVALID_JSON: 'invalid_json',
  INVALID_FRAME: 'invalid_frame',
  UNKNOWN_TYPE: 'unknown_type',
  NOT_A_PARTICIPANT: 'not_a_participant',
  NOT_JOINED: 'not_joined',
  PEER_UNREACHABLE: 'peer_unreachable',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type SignalingErrorCode =
  (typeof SignalingErrorCode)[keyof typeof SignalingErrorCode];

/** Anything pushed to a client. Field names follow the wire protocol. */
export interface OutboundFrame {
  type: string;
  call_id?: string;
  [field: string]: unknown;
}

export const isInboundFrameType = (value: string): value is InboundFrameType =>
  Object.values<string>(InboundFrameType).includes(value);

/**
 * Envelope of a client frame. Fields specific to a frame type are checked
 * by the relay once the type is known.
 */
export class SignalingFrameDto {
  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsUUID()
  call_id!: string;

  @IsOptional()
  @IsUUID()
  to_user_id?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sdp?: string;

  @IsOptional()
  @IsObject()
  candidate?: Record<string, unknown>;

  @IsOptional()
  @IsBoolean()
  is_muted?: boolean;

  @IsOptional()
  @IsBoolean()
  is_video_enabled?: boolean;

  @IsOptional()
  @IsBoolean()
  is_screen_sharing?: boolean;
}
