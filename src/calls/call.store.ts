import { Call, User } from '../entities';

export const CALL_STORE = 'CALL_STORE';

export interface CallHistoryPage {
  calls: Call[];
  total: number;
}

/**
 * Persistence port for call aggregates. A loaded Call carries its
 * participants (with users), its invitations and its initiator.
 */
export interface CallStore {
  findActiveUsers(userIds: string[]): Promise<User[]>;

  findCall(callId: string): Promise<Call | null>;

  findLiveDirectCallBetween(
    userId: string,
    otherUserId: string,
  ): Promise<Call | null>;

  /** Inserts the call with its initial participants. */
  createCall(call: Call): Promise<Call>;

  /**
   * Persists the call row, its participants and its invitations as one unit.
   * Rejects with a conflict when the stored revision no longer matches
   * `call.revision`.
   */
  saveCall(call: Call): Promise<Call>;

  findHistory(
    userId: string,
    limit: number,
    offset: number,
  ): Promise<CallHistoryPage>;

  findLiveCallsForUser(userId: string): Promise<Call[]>;

  /** Ids of live calls that still have a participant ringing since before `cutoff`. */
  findCallIdsRingingSince(cutoff: Date): Promise<string[]>;

  /** Marks pending invitations past their expiry as expired, returns the count. */
  expireInvitations(now: Date): Promise<number>;
}
