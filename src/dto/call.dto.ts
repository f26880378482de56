import {
  IsOptional,
  IsUUID,
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsObject,
  IsString,
  ArrayMinSize,
  ArrayMaxSize,
  ArrayUnique,
  MaxLength,
  Min,
  Max,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  CallMode,
  CallStatus,
  CallType,
  ConnectionQuality,
  ParticipantRole,
  ParticipantStatus,
} from '../entities';

export class InitiateCallDto {
  @ApiProperty({
    example: ['user-id-1'],
    description: 'One id for a 1-on-1 call, several for a group call',
  })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @ArrayUnique()
  @IsUUID('all', { each: true })
  participantIds!: string[];

  @ApiProperty({ enum: CallType, example: CallType.AUDIO })
  @IsEnum(CallType)
  callType!: CallType;

  @ApiPropertyOptional({ example: 4, minimum: 2, maximum: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(2)
  @Max(50)
  maxParticipants?: number;

  @ApiPropertyOptional({ example: { client: 'web' } })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class AnswerCallDto {
  @ApiPropertyOptional({ example: { device: 'phone' } })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class DeclineCallDto {
  @ApiPropertyOptional({ example: 'busy', maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  reason?: string;
}

export class EndCallDto {
  @ApiPropertyOptional({ example: 'user_hangup', maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  reason?: string;
}

export class InviteToCallDto {
  @ApiProperty({ example: ['user-id-4'] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(10)
  @ArrayUnique()
  @IsUUID('all', { each: true })
  userIds!: string[];
}

export class UpdateMediaStateDto {
  @ApiPropertyOptional({ example: true })
  @IsOptional()
  @IsBoolean()
  isMuted?: boolean;

  @ApiPropertyOptional({ example: false })
  @IsOptional()
  @IsBoolean()
  isVideoEnabled?: boolean;

  @ApiPropertyOptional({ example: false })
  @IsOptional()
  @IsBoolean()
  isScreenSharing?: boolean;

  @ApiPropertyOptional({ enum: ConnectionQuality })
  @IsOptional()
  @IsEnum(ConnectionQuality)
  connectionQuality?: ConnectionQuality;
}

export class CallHistoryQueryDto {
  @ApiPropertyOptional({ default: 50, minimum: 1, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @ApiPropertyOptional({ default: 0, minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}

export class UserCallInfoDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  firstName!: string;

  @ApiProperty()
  lastName!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  profilePicture!: string | null;
}

export class CallParticipantResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  userId!: string;

  @ApiPropertyOptional({ type: UserCallInfoDto })
  user?: UserCallInfoDto;

  @ApiProperty({ enum: ParticipantRole })
  role!: ParticipantRole;

  @ApiProperty({ enum: ParticipantStatus })
  status!: ParticipantStatus;

  @ApiProperty()
  invitedAt!: Date;

  @ApiPropertyOptional({ nullable: true, type: Date })
  joinedAt!: Date | null;

  @ApiPropertyOptional({ nullable: true, type: Date })
  leftAt!: Date | null;

  @ApiProperty()
  isMuted!: boolean;

  @ApiProperty()
  isVideoEnabled!: boolean;

  @ApiProperty()
  isScreenSharing!: boolean;

  @ApiPropertyOptional({ enum: ConnectionQuality, nullable: true })
  connectionQuality!: ConnectionQuality | null;

  @ApiPropertyOptional({ nullable: true, type: Number })
  durationSeconds!: number | null;
}

export class CallResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  initiatorId!: string;

  @ApiPropertyOptional({ type: UserCallInfoDto })
  initiator?: UserCallInfoDto;

  @ApiProperty({ enum: CallType })
  callType!: CallType;

  @ApiProperty({ enum: CallMode })
  callMode!: CallMode;

  @ApiProperty({ enum: CallStatus })
  status!: CallStatus;

  @ApiPropertyOptional({ nullable: true, type: Number })
  maxParticipants!: number | null;

  @ApiProperty()
  startedAt!: Date;

  @ApiPropertyOptional({ nullable: true, type: Date })
  endedAt!: Date | null;

  @ApiPropertyOptional({ nullable: true, type: Number })
  durationSeconds!: number | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  endedBy!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  endReason!: string | null;

  @ApiProperty({ type: Object })
  metadata!: Record<string, unknown>;

  @ApiProperty({ type: [CallParticipantResponseDto] })
  participants!: CallParticipantResponseDto[];

  @ApiProperty()
  activeParticipantCount!: number;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}

export class IceServerDto {
  @ApiProperty({
    oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
  })
  urls!: string | string[];

  @ApiPropertyOptional()
  username?: string;

  @ApiPropertyOptional()
  credential?: string;
}

export class WebRtcConfigDto {
  @ApiProperty({ type: [IceServerDto] })
  iceServers!: IceServerDto[];

  @ApiProperty({ enum: ['all', 'relay'] })
  iceTransportPolicy!: 'all' | 'relay';
}

export class CallInitiateResponseDto {
  @ApiProperty({ example: 'Call initiated successfully (1-on-1)' })
  message!: string;

  @ApiProperty({ type: CallResponseDto })
  call!: CallResponseDto;

  @ApiProperty({ type: [IceServerDto] })
  iceServers!: IceServerDto[];
}

export class CallAnswerResponseDto {
  @ApiProperty({ type: CallResponseDto })
  call!: CallResponseDto;

  @ApiProperty({ type: [IceServerDto] })
  iceServers!: IceServerDto[];
}

export class CallInviteResponseDto {
  @ApiProperty({ example: 'Invited 2 participants' })
  message!: string;

  @ApiProperty()
  invitedCount!: number;

  @ApiProperty({ type: [CallParticipantResponseDto] })
  participants!: CallParticipantResponseDto[];
}

export class CallHistoryItemDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ enum: CallType })
  callType!: CallType;

  @ApiProperty({ enum: CallMode })
  callMode!: CallMode;

  @ApiProperty({ enum: CallStatus })
  status!: CallStatus;

  @ApiProperty()
  startedAt!: Date;

  @ApiPropertyOptional({ nullable: true, type: Date })
  endedAt!: Date | null;

  @ApiPropertyOptional({ nullable: true, type: Number })
  durationSeconds!: number | null;

  @ApiProperty()
  initiatorId!: string;

  @ApiProperty()
  initiatorName!: string;

  @ApiProperty()
  participantCount!: number;

  @ApiProperty({ type: [String] })
  participantNames!: string[];

  @ApiProperty({ example: 'initiator' })
  userRole!: string;
}

export class CallHistoryResponseDto {
  @ApiProperty({ type: [CallHistoryItemDto] })
  calls!: CallHistoryItemDto[];

  @ApiProperty()
  total!: number;

  @ApiProperty()
  page!: number;

  @ApiProperty()
  limit!: number;

  @ApiProperty()
  hasMore!: boolean;
}

export class ActiveCallsResponseDto {
  @ApiProperty({ type: [CallResponseDto] })
  calls!: CallResponseDto[];

  @ApiProperty()
  total!: number;
}
