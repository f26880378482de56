import { randomUUID } from 'crypto';
import {
  Call,
  CallMode,
  InvitationStatus,
  ParticipantStatus,
  User,
  UserStatus,
  isLiveCallStatus,
} from '../../src/entities';
import { CallHistoryPage, CallStore } from '../../src/calls/call.store';
import { callConflict } from '../../src/calls/call.errors';

/**
 * Keeps call aggregates in a map and hands out deep copies, so callers see
 * the same detached-entity behaviour as with the database store.
 */
export class InMemoryCallStore implements CallStore {
  readonly users = new Map<string, User>();
  saveCount = 0;
  private readonly calls = new Map<string, Call>();

  addUser(id: string, overrides: Partial<User> = {}): User {
    const now = new Date();
    const user = Object.assign(new User(), {
      id,
      email: `${id}@example.com`,
      firstName: `First-${id.slice(0, 4)}`,
      lastName: 'Tester',
      profilePicture: null,
      status: UserStatus.ACTIVE,
      createdAt: now,
      updatedAt: now,
      ...overrides,
    });
    this.users.set(id, user);
    return user;
  }

  /** Raw stored copy, bypassing hydration. */
  peek(callId: string): Call | undefined {
    const call = this.calls.get(callId);
    return call ? structuredClone(call) : undefined;
  }

  /** Overwrites stored state directly, as a concurrent writer would. */
  tamper(callId: string, change: (call: Call) => void): void {
    const call = this.calls.get(callId);
    if (!call) {
      throw new Error(`Unknown call ${callId}`);
    }
    change(call);
  }

  async findActiveUsers(userIds: string[]): Promise<User[]> {
    return userIds
      .map((id) => this.users.get(id))
      .filter(
        (user): user is User =>
          user !== undefined && user.status === UserStatus.ACTIVE,
      );
  }

  async findCall(callId: string): Promise<Call | null> {
    const call = this.calls.get(callId);
    return call ? this.hydrate(call) : null;
  }

  async findLiveDirectCallBetween(
    userId: string,
    otherUserId: string,
  ): Promise<Call | null> {
    const match = Array.from(this.calls.values()).find(
      (call) =>
        call.callMode === CallMode.ONE_ON_ONE &&
        isLiveCallStatus(call.status) &&
        call.participants.some((p) => p.userId === userId) &&
        call.participants.some((p) => p.userId === otherUserId),
    );
    return match ? this.hydrate(match) : null;
  }

  async createCall(call: Call): Promise<Call> {
    const now = new Date();
    const stored = structuredClone(call);
    stored.id = randomUUID();
    stored.revision = 0;
    stored.createdAt = now;
    stored.updatedAt = now;
    this.assignChildIds(stored, now);
    this.calls.set(stored.id, stored);
    return this.hydrate(stored);
  }

  async saveCall(call: Call): Promise<Call> {
    const current = this.calls.get(call.id);
    if (!current) {
      throw new Error(`Unknown call ${call.id}`);
    }
    if (current.revision !== call.revision) {
      throw callConflict(call.id);
    }

    const now = new Date();
    const stored = structuredClone(call);
    stored.revision = call.revision + 1;
    stored.updatedAt = now;
    this.assignChildIds(stored, now);
    this.calls.set(stored.id, stored);
    this.saveCount += 1;
    return this.hydrate(stored);
  }

  async findHistory(
    userId: string,
    limit: number,
    offset: number,
  ): Promise<CallHistoryPage> {
    const mine = Array.from(this.calls.values())
      .filter((call) => call.participants.some((p) => p.userId === userId))
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());

    return {
      calls: mine
        .slice(offset, offset + limit)
        .map((call) => this.hydrate(call)),
      total: mine.length,
    };
  }

  async findLiveCallsForUser(userId: string): Promise<Call[]> {
    return Array.from(this.calls.values())
      .filter(
        (call) =>
          isLiveCallStatus(call.status) &&
          call.participants.some(
            (p) =>
              p.userId === userId && p.status === ParticipantStatus.JOINED,
          ),
      )
      .map((call) => this.hydrate(call));
  }

  async findCallIdsRingingSince(cutoff: Date): Promise<string[]> {
    return Array.from(this.calls.values())
      .filter(
        (call) =>
          isLiveCallStatus(call.status) &&
          call.participants.some(
            (p) =>
              p.status === ParticipantStatus.RINGING &&
              p.invitedAt.getTime() <= cutoff.getTime(),
          ),
      )
      .map((call) => call.id);
  }

  async expireInvitations(now: Date): Promise<number> {
    let expired = 0;
    this.calls.forEach((call) => {
      call.invitations.forEach((invitation) => {
        if (
          invitation.status === InvitationStatus.PENDING &&
          invitation.expiresAt &&
          invitation.expiresAt.getTime() < now.getTime()
        ) {
          invitation.status = InvitationStatus.EXPIRED;
          expired += 1;
        }
      });
    });
    return expired;
  }

  private assignChildIds(call: Call, now: Date): void {
    call.participants = (call.participants ?? []).map((participant) => ({
      ...participant,
      id: participant.id ?? randomUUID(),
      callId: call.id,
      createdAt: participant.createdAt ?? now,
      updatedAt: now,
    }));
    call.invitations = (call.invitations ?? []).map((invitation) => ({
      ...invitation,
      id: invitation.id ?? randomUUID(),
      callId: call.id,
      createdAt: invitation.createdAt ?? now,
    }));
  }

  private hydrate(stored: Call): Call {
    const call = structuredClone(stored);
    const initiator = this.users.get(call.initiatorId);
    if (initiator) {
      call.initiator = initiator;
    }
    call.participants.forEach((participant) => {
      const user = this.users.get(participant.userId);
      if (user) {
        participant.user = user;
      }
    });
    return call;
  }
}
