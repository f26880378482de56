import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
  Index,
} from 'typeorm';
import { Call } from './call.entity';

export enum InvitationStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  DECLINED = 'declined',
  EXPIRED = 'expired',
}

// Audit record of an invite into a running group call. Membership itself
// lives on CallParticipant.
@Entity('call_invitations')
@Unique('uq_call_invitations_call_user', ['callId', 'invitedUserId'])
export class CallInvitation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({
    type: 'varchar',
    length: 20,
    default: InvitationStatus.PENDING,
  })
  status!: InvitationStatus;

  @Column({ type: 'timestamp' })
  invitedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  respondedAt!: Date | null;

  @Index()
  @Column({ type: 'timestamp', nullable: true })
  expiresAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Call, (call) => call.invitations, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'callId' })
  call!: Call;

  @Index()
  @Column('uuid')
  callId!: string;

  @Index()
  @Column('uuid')
  invitedUserId!: string;

  @Column('uuid')
  invitedBy!: string;
}
