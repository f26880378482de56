import { Injectable, Logger } from '@nestjs/common';
import { OutboundFrame } from '../dto/signaling.dto';

/** One live device connection. `send` throws once the transport is gone. */
export interface RealtimeConnection {
  readonly id: string;
  send(frame: OutboundFrame): void;
}

export type PeerDelivery = 'delivered' | 'not_in_call' | 'offline';

/**
 * Presence and fan-out for live connections. Tracks every device a user has
 * open, and which users are signaling in which call. It knows nothing about
 * call rules; callers decide who may be added.
 *
 * Every method is synchronous, so each one completes without interleaving
 * with other registry calls.
 */
@Injectable()
export class ConnectionRegistryService {
  private readonly logger = new Logger(ConnectionRegistryService.name);
  private readonly connectionsByUser = new Map<
    string,
    Map<string, RealtimeConnection>
  >();
  private readonly ownerByConnection = new Map<string, string>();
  private readonly callMembers = new Map<string, Set<string>>();

  connect(connection: RealtimeConnection, userId: string): void {
    const previousOwner = this.ownerByConnection.get(connection.id);
    if (previousOwner && previousOwner !== userId) {
      this.disconnect(connection.id);
    }

    let devices = this.connectionsByUser.get(userId);
    if (!devices) {
      devices = new Map();
      this.connectionsByUser.set(userId, devices);
    }
    devices.set(connection.id, connection);
    this.ownerByConnection.set(connection.id, userId);

    this.logger.log(
      `Connection ${connection.id} registered for user ${userId} (${devices.size} devices)`,
    );
  }

  /** Returns the owner of the removed connection, if it was registered. */
  disconnect(connectionId: string): string | undefined {
    const userId = this.ownerByConnection.get(connectionId);
    if (!userId) {
      return undefined;
    }
    this.ownerByConnection.delete(connectionId);

    const devices = this.connectionsByUser.get(userId);
    if (devices) {
      devices.delete(connectionId);
      if (devices.size === 0) {
        this.connectionsByUser.delete(userId);
      }
    }

    this.logger.log(`Connection ${connectionId} of user ${userId} removed`);
    return userId;
  }

  getConnection(connectionId: string): RealtimeConnection | undefined {
    const userId = this.ownerByConnection.get(connectionId);
    return userId
      ? this.connectionsByUser.get(userId)?.get(connectionId)
      : undefined;
  }

  isOnline(userId: string): boolean {
    return (this.connectionsByUser.get(userId)?.size ?? 0) > 0;
  }

  getOnlineUsers(): string[] {
    return Array.from(this.connectionsByUser.keys());
  }

  getConnectionCount(): number {
    return this.ownerByConnection.size;
  }

  addToCall(callId: string, userId: string): void {
    let members = this.callMembers.get(callId);
    if (!members) {
      members = new Set();
      this.callMembers.set(callId, members);
    }
    if (!members.has(userId)) {
      members.add(userId);
      this.logger.debug(`User ${userId} added to call ${callId}`);
    }
  }

  removeFromCall(callId: string, userId: string): void {
    const members = this.callMembers.get(callId);
    if (!members) {
      return;
    }
    members.delete(userId);
    if (members.size === 0) {
      this.callMembers.delete(callId);
    }
    this.logger.debug(`User ${userId} removed from call ${callId}`);
  }

  clearCall(callId: string): void {
    this.callMembers.delete(callId);
  }

  isInCall(callId: string, userId: string): boolean {
    return this.callMembers.get(callId)?.has(userId) ?? false;
  }

  getCallMembers(callId: string): string[] {
    return Array.from(this.callMembers.get(callId) ?? []);
  }

  getCallMemberCount(callId: string): number {
    return this.callMembers.get(callId)?.size ?? 0;
  }

  getCallsForUser(userId: string): string[] {
    const calls: string[] = [];
    this.callMembers.forEach((members, callId) => {
      if (members.has(userId)) {
        calls.push(callId);
      }
    });
    return calls;
  }

  /**
   * Delivers to every device of the user and returns how many accepted the
   * frame. Devices whose send fails are dropped from the registry.
   */
  sendPersonalMessage(message: OutboundFrame, userId: string): number {
    const devices = this.connectionsByUser.get(userId);
    if (!devices || devices.size === 0) {
      this.logger.debug(
        `User ${userId} has no live connections, ${message.type} not delivered`,
      );
      return 0;
    }

    let delivered = 0;
    const dead: string[] = [];
    for (const connection of Array.from(devices.values())) {
      try {
        connection.send(message);
        delivered += 1;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Failed to send ${message.type} to user ${userId} on ${connection.id}: ${reason}`,
        );
        dead.push(connection.id);
      }
    }

    dead.forEach((connectionId) => this.disconnect(connectionId));
    return delivered;
  }

  sendToCall(
    message: OutboundFrame,
    callId: string,
    excludeUserId?: string,
  ): number {
    const members = this.getCallMembers(callId);
    if (members.length === 0) {
      this.logger.debug(`Call ${callId} has no signaling members`);
      return 0;
    }

    return members
      .filter((userId) => userId !== excludeUserId)
      .reduce(
        (delivered, userId) =>
          delivered + this.sendPersonalMessage(message, userId),
        0,
      );
  }

  sendToPeer(
    message: OutboundFrame,
    fromUserId: string,
    toUserId: string,
    callId: string,
  ): PeerDelivery {
    if (!this.isInCall(callId, fromUserId) || !this.isInCall(callId, toUserId)) {
      this.logger.warn(
        `Peer frame ${message.type} dropped in call ${callId}: from=${this.isInCall(callId, fromUserId)} to=${this.isInCall(callId, toUserId)}`,
      );
      return 'not_in_call';
    }

    const delivered = this.sendPersonalMessage(
      { ...message, from_user_id: fromUserId, call_id: callId },
      toUserId,
    );
    return delivered > 0 ? 'delivered' : 'offline';
  }
}
