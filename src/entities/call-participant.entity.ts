import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { Call } from './call.entity';

export enum ParticipantRole {
  INITIATOR = 'initiator',
  PARTICIPANT = 'participant',
}

export enum ParticipantStatus {
  RINGING = 'ringing',
  JOINED = 'joined',
  LEFT = 'left',
  DECLINED = 'declined',
  MISSED = 'missed',
}

export enum ConnectionQuality {
  EXCELLENT = 'excellent',
  GOOD = 'good',
  FAIR = 'fair',
  POOR = 'poor',
}

@Entity('call_participants')
@Unique('uq_call_participants_call_user', ['callId', 'userId'])
export class CallParticipant {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  role!: ParticipantRole;

  @Index()
  @Column({
    type: 'varchar',
    length: 20,
    default: ParticipantStatus.RINGING,
  })
  status!: ParticipantStatus;

  @Column({ type: 'timestamp' })
  invitedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  joinedAt!: Date | null;

  @Column({ type: 'timestamp', nullable: true })
  leftAt!: Date | null;

  @Column({ default: false })
  isMuted!: boolean;

  @Column({ default: true })
  isVideoEnabled!: boolean;

  @Column({ default: false })
  isScreenSharing!: boolean;

  @Column({ type: 'varchar', length: 20, nullable: true })
  connectionQuality!: ConnectionQuality | null;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  metadata!: Record<string, unknown>;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Index()
  @Column('uuid')
  userId!: string;

  @ManyToOne(() => Call, (call) => call.participants, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'callId' })
  call!: Call;

  @Index()
  @Column('uuid')
  callId!: string;
}

/** Seconds spent in the call, or null if the participant never joined. */
export const participantDurationSeconds = (
  participant: Pick<CallParticipant, 'joinedAt' | 'leftAt'>,
  now: Date = new Date(),
): number | null => {
  if (!participant.joinedAt) {
    return null;
  }
  const end = participant.leftAt ?? now;
  return Math.max(
    0,
    Math.floor((end.getTime() - participant.joinedAt.getTime()) / 1000),
  );
};
