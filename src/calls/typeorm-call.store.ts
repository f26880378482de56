import { Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, In, LessThan, Repository } from 'typeorm';
import {
  Call,
  CallInvitation,
  CallMode,
  CallParticipant,
  InvitationStatus,
  LIVE_CALL_STATUSES,
  ParticipantStatus,
  User,
  UserStatus,
} from '../entities';
import { DATA_SOURCE } from '../config/database.providers';
import { CallHistoryPage, CallStore } from './call.store';
import { callConflict } from './call.errors';

const CALL_RELATIONS = {
  initiator: true,
  participants: { user: true },
  invitations: true,
} as const;

@Injectable()
export class TypeOrmCallStore implements CallStore {
  private readonly logger = new Logger(TypeOrmCallStore.name);
  private callRepository: Repository<Call>;
  private userRepository: Repository<User>;
  private invitationRepository: Repository<CallInvitation>;

  constructor(
    @Inject(DATA_SOURCE)
    private readonly dataSource: DataSource,
  ) {
    this.callRepository = this.dataSource.getRepository(Call);
    this.userRepository = this.dataSource.getRepository(User);
    this.invitationRepository = this.dataSource.getRepository(CallInvitation);
  }

  async findActiveUsers(userIds: string[]): Promise<User[]> {
    if (userIds.length === 0) {
      return [];
    }
    return this.userRepository.find({
      where: { id: In(userIds), status: UserStatus.ACTIVE },
    });
  }

  async findCall(callId: string): Promise<Call | null> {
    return this.callRepository.findOne({
      where: { id: callId },
      relations: CALL_RELATIONS,
    });
  }

  async findLiveDirectCallBetween(
    userId: string,
    otherUserId: string,
  ): Promise<Call | null> {
    return this.callRepository
      .createQueryBuilder('call')
      .innerJoin('call.participants', 'participant')
      .where('call.status IN (:...statuses)', {
        statuses: LIVE_CALL_STATUSES,
      })
      .andWhere('call.callMode = :mode', { mode: CallMode.ONE_ON_ONE })
      .andWhere('participant.userId IN (:...userIds)', {
        userIds: [userId, otherUserId],
      })
      .groupBy('call.id')
      .having('COUNT(participant.id) = 2')
      .getOne();
  }

  async createCall(call: Call): Promise<Call> {
    const callId = await this.dataSource.transaction(async (manager) => {
      const { participants, invitations, ...row } = call;
      const saved = await manager.save(Call, manager.create(Call, row));

      await manager.save(
        CallParticipant,
        (participants ?? []).map((participant) =>
          manager.create(CallParticipant, {
            ...participant,
            callId: saved.id,
          }),
        ),
      );
      if (invitations?.length) {
        await manager.save(
          CallInvitation,
          invitations.map((invitation) =>
            manager.create(CallInvitation, {
              ...invitation,
              callId: saved.id,
            }),
          ),
        );
      }

      return saved.id;
    });

    return this.requireCall(callId);
  }

  async saveCall(call: Call): Promise<Call> {
    await this.dataSource.transaction(async (manager) => {
      await this.compareAndBump(manager, call);

      if (call.participants?.length) {
        await manager.save(
          CallParticipant,
          call.participants.map((participant) =>
            manager.create(CallParticipant, {
              ...participant,
              callId: call.id,
            }),
          ),
        );
      }
      if (call.invitations?.length) {
        await manager.save(
          CallInvitation,
          call.invitations.map((invitation) =>
            manager.create(CallInvitation, {
              ...invitation,
              callId: call.id,
            }),
          ),
        );
      }
    });

    return this.requireCall(call.id);
  }

  async findHistory(
    userId: string,
    limit: number,
    offset: number,
  ): Promise<CallHistoryPage> {
    const [calls, total] = await this.callRepository
      .createQueryBuilder('call')
      .innerJoin(
        'call.participants',
        'membership',
        'membership.userId = :userId',
        { userId },
      )
      .leftJoinAndSelect('call.initiator', 'initiator')
      .leftJoinAndSelect('call.participants', 'participant')
      .leftJoinAndSelect('participant.user', 'participantUser')
      .orderBy('call.startedAt', 'DESC')
      .skip(offset)
      .take(limit)
      .getManyAndCount();

    return { calls, total };
  }

  async findLiveCallsForUser(userId: string): Promise<Call[]> {
    return this.callRepository
      .createQueryBuilder('call')
      .innerJoin(
        'call.participants',
        'membership',
        'membership.userId = :userId AND membership.status = :memberStatus',
        { userId, memberStatus: ParticipantStatus.JOINED },
      )
      .leftJoinAndSelect('call.initiator', 'initiator')
      .leftJoinAndSelect('call.participants', 'participant')
      .leftJoinAndSelect('participant.user', 'participantUser')
      .where('call.status IN (:...statuses)', {
        statuses: LIVE_CALL_STATUSES,
      })
      .orderBy('call.startedAt', 'DESC')
      .getMany();
  }

  async findCallIdsRingingSince(cutoff: Date): Promise<string[]> {
    const rows = await this.dataSource
      .getRepository(CallParticipant)
      .createQueryBuilder('participant')
      .innerJoin('participant.call', 'call')
      .select('DISTINCT participant.callId', 'callId')
      .where('participant.status = :status', {
        status: ParticipantStatus.RINGING,
      })
      .andWhere('participant.invitedAt <= :cutoff', { cutoff })
      .andWhere('call.status IN (:...statuses)', {
        statuses: LIVE_CALL_STATUSES,
      })
      .getRawMany<{ callId: string }>();

    return rows.map((row) => row.callId);
  }

  async expireInvitations(now: Date): Promise<number> {
    const result = await this.invitationRepository.update(
      { status: InvitationStatus.PENDING, expiresAt: LessThan(now) },
      { status: InvitationStatus.EXPIRED },
    );
    return result.affected ?? 0;
  }

  private async compareAndBump(
    manager: EntityManager,
    call: Call,
  ): Promise<void> {
    const result = await manager.update(
      Call,
      { id: call.id, revision: call.revision },
      {
        status: call.status,
        endedAt: call.endedAt,
        durationSeconds: call.durationSeconds,
        endedBy: call.endedBy,
        endReason: call.endReason,
        revision: call.revision + 1,
      },
    );

    if (!result.affected) {
      this.logger.warn(
        `Revision ${call.revision} of call ${call.id} is stale, rejecting write`,
      );
      throw callConflict(call.id);
    }
  }

  private async requireCall(callId: string): Promise<Call> {
    const call = await this.findCall(callId);
    if (!call) {
      throw new Error(`Call ${callId} vanished after write`);
    }
    return call;
  }
}
