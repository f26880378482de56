import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { CallParticipant } from './call-participant.entity';
import { CallInvitation } from './call-invitation.entity';

export enum CallType {
  AUDIO = 'audio',
  VIDEO = 'video',
}

export enum CallMode {
  ONE_ON_ONE = '1-on-1',
  GROUP = 'group',
}

export enum CallStatus {
  RINGING = 'ringing',
  ACTIVE = 'active',
  ENDED = 'ended',
  MISSED = 'missed',
  DECLINED = 'declined',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const LIVE_CALL_STATUSES: readonly CallStatus[] = [
  CallStatus.RINGING,
  CallStatus.ACTIVE,
];

export const isLiveCallStatus = (status: CallStatus): boolean =>
  LIVE_CALL_STATUSES.includes(status);

@Entity('calls')
export class Call {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  callType!: CallType;

  @Index()
  @Column({ type: 'varchar', length: 20 })
  callMode!: CallMode;

  @Index()
  @Column({
    type: 'varchar',
    length: 20,
    default: CallStatus.RINGING,
  })
  status!: CallStatus;

  // Group calls only, never below 2.
  @Column({ type: 'int', nullable: true })
  maxParticipants!: number | null;

  @Index()
  @Column({ type: 'timestamp' })
  startedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  endedAt!: Date | null;

  @Column({ type: 'int', nullable: true })
  durationSeconds!: number | null;

  @Column({ type: 'uuid', nullable: true })
  endedBy!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  endReason!: string | null;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  metadata!: Record<string, unknown>;

  // Bumped on every write; saves compare against it.
  @Column({ type: 'int', default: 0 })
  revision!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  // Relations
  @ManyToOne(() => User)
  @JoinColumn({ name: 'initiatorId' })
  initiator!: User;

  @Index()
  @Column('uuid')
  initiatorId!: string;

  @OneToMany(() => CallParticipant, (participant) => participant.call)
  participants!: CallParticipant[];

  @OneToMany(() => CallInvitation, (invitation) => invitation.call)
  invitations!: CallInvitation[];
}
