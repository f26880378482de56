import {
  WebSocketGateway,
  SubscribeMessage,
  MessageBody,
  ConnectedSocket,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
} from '@nestjs/websockets';
import { Namespace, Socket } from 'socket.io';
import { Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import {
  OutboundFrame,
  OutboundFrameType,
  SIGNAL_EVENT,
} from '../dto/signaling.dto';
import {
  ConnectionRegistryService,
  RealtimeConnection,
} from '../realtime/connection-registry.service';
import { KeyedMutex } from '../common/keyed-mutex';
import { JwtPayload } from '../auth/jwt.strategy';
import { SignalingRelayService } from './signaling-relay.service';

interface AuthenticatedSocket extends Socket {
  userId?: string;
  user?: JwtPayload;
}

class SocketConnection implements RealtimeConnection {
  constructor(private readonly socket: Socket) {}

  get id(): string {
    return this.socket.id;
  }

  send(frame: OutboundFrame): void {
    if (this.socket.disconnected) {
      throw new Error(`socket ${this.socket.id} is disconnected`);
    }
    this.socket.emit(SIGNAL_EVENT, frame);
  }
}

const firstString = (value: unknown): string | null => {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' && first.length > 0 ? first : null;
  }
  return null;
};

@WebSocketGateway({
  cors: {
    origin: '*',
    methods: ['GET', 'POST'],
    credentials: true,
  },
  namespace: '/signaling',
})
export class SignalingGateway
  implements OnGatewayConnection, OnGatewayDisconnect, OnGatewayInit
{
  private readonly logger = new Logger(SignalingGateway.name);
  // Frames of one socket are handled strictly one after another.
  private readonly frameQueues = new KeyedMutex();

  constructor(
    private readonly jwtService: JwtService,
    private readonly registry: ConnectionRegistryService,
    private readonly relay: SignalingRelayService,
  ) {}

  afterInit(server: Namespace) {
    this.logger.log(`Signaling namespace ${server.name} initialized`);
  }

  handleConnection(client: AuthenticatedSocket) {
    const token = this.extractToken(client);
    if (!token) {
      this.logger.warn(`Client ${client.id} connected without token`);
      client.disconnect(true);
      return;
    }

    let payload: JwtPayload;
    try {
      payload = this.jwtService.verify<JwtPayload>(token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Client ${client.id} rejected: ${reason}`);
      client.disconnect(true);
      return;
    }

    if (!payload.sub) {
      client.disconnect(true);
      return;
    }

    client.userId = payload.sub;
    client.user = payload;

    const connection = new SocketConnection(client);
    this.registry.connect(connection, payload.sub);
    connection.send({
      type: OutboundFrameType.CONNECTED,
      user_id: payload.sub,
    });
  }

  handleDisconnect(client: AuthenticatedSocket) {
    const userId = client.userId;
    this.registry.disconnect(client.id);

    if (userId && !this.registry.isOnline(userId)) {
      this.relay.handleUserOffline(userId);
    }
  }

  @SubscribeMessage(SIGNAL_EVENT)
  async handleSignal(
    @ConnectedSocket() client: AuthenticatedSocket,
    @MessageBody() frame: unknown,
  ): Promise<void> {
    const userId = client.userId;
    if (!userId) {
      client.disconnect(true);
      return;
    }

    const connection =
      this.registry.getConnection(client.id) ?? new SocketConnection(client);

    await this.frameQueues.runExclusive(client.id, () =>
      this.relay.handleFrame(connection, userId, frame),
    );
  }

  private extractToken(client: Socket): string | null {
    const { query, auth, headers } = client.handshake;

    const fromQuery = firstString(query.token);
    if (fromQuery) {
      return fromQuery;
    }

    const fromAuth = firstString(auth?.token);
    if (fromAuth) {
      return fromAuth;
    }

    const header = headers.authorization;
    if (typeof header === 'string' && header.startsWith('Bearer ')) {
      return header.slice('Bearer '.length);
    }

    return null;
  }
}
