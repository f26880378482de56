import { JwtService } from '@nestjs/jwt';
import { Socket } from 'socket.io';
import { SignalingGateway } from './signaling.gateway';
import { SignalingRelayService } from './signaling-relay.service';
import { ConnectionRegistryService } from '../realtime/connection-registry.service';

const U1 = '11111111-1111-4111-8111-111111111111';

interface StubHandshake {
  query?: Record<string, string | string[]>;
  auth?: Record<string, unknown>;
  headers?: Record<string, string>;
}

describe('SignalingGateway', () => {
  const buildGateway = () => {
    const jwtService = {
      verify: jest.fn().mockReturnValue({ sub: U1, email: 'u1@example.com' }),
    };
    const relay = {
      handleFrame: jest.fn().mockResolvedValue(undefined),
      handleUserOffline: jest.fn(),
    };
    const registry = new ConnectionRegistryService();

    const gateway = new SignalingGateway(
      jwtService as unknown as JwtService,
      registry,
      relay as unknown as SignalingRelayService,
    );

    return { gateway, jwtService, relay, registry };
  };

  const buildSocket = (id: string, handshake: StubHandshake = {}) => {
    const stub = {
      id,
      disconnected: false,
      handshake: {
        query: handshake.query ?? {},
        auth: handshake.auth ?? {},
        headers: handshake.headers ?? {},
      },
      emit: jest.fn(),
      disconnect: jest.fn(),
    };
    return { stub, socket: stub as unknown as Socket };
  };

  it('registers a socket authenticated by a query token', () => {
    const { gateway, jwtService, registry } = buildGateway();
    const { stub, socket } = buildSocket('socket-1', {
      query: { token: 'test-token' },
    });

    gateway.handleConnection(socket);

    expect(jwtService.verify).toHaveBeenCalledWith('test-token');
    expect(registry.isOnline(U1)).toBe(true);
    expect(stub.emit).toHaveBeenCalledWith('signal', {
      type: 'connected',
      user_id: U1,
    });
    expect(stub.disconnect).not.toHaveBeenCalled();
  });

  it('reads the token from the handshake auth or a bearer header', () => {
    const { gateway, jwtService } = buildGateway();

    gateway.handleConnection(
      buildSocket('socket-1', { auth: { token: 'auth-token' } }).socket,
    );
    gateway.handleConnection(
      buildSocket('socket-2', {
        headers: { authorization: 'Bearer header-token' },
      }).socket,
    );

    expect(jwtService.verify).toHaveBeenNthCalledWith(1, 'auth-token');
    expect(jwtService.verify).toHaveBeenNthCalledWith(2, 'header-token');
  });

  it('disconnects sockets without a token', () => {
    const { gateway, jwtService, registry } = buildGateway();
    const { stub, socket } = buildSocket('socket-1');

    gateway.handleConnection(socket);

    expect(stub.disconnect).toHaveBeenCalledWith(true);
    expect(jwtService.verify).not.toHaveBeenCalled();
    expect(registry.getConnectionCount()).toBe(0);
  });

  it('disconnects sockets with an invalid token', () => {
    const { gateway, jwtService, registry } = buildGateway();
    jwtService.verify.mockImplementationOnce(() => {
      throw new Error('invalid signature');
    });
    const { stub, socket } = buildSocket('socket-1', {
      query: { token: 'test-token' },
    });

    gateway.handleConnection(socket);

    expect(stub.disconnect).toHaveBeenCalledWith(true);
    expect(registry.getConnectionCount()).toBe(0);
  });

  it('hands frames to the relay with the socket identity', async () => {
    const { gateway, relay } = buildGateway();
    const { socket } = buildSocket('socket-1', {
      query: { token: 'test-token' },
    });
    gateway.handleConnection(socket);

    const frame = { type: 'join-call', call_id: 'call-1' };
    await gateway.handleSignal(socket, frame);

    expect(relay.handleFrame).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'socket-1' }),
      U1,
      frame,
    );
  });

  it('processes frames of one socket in arrival order', async () => {
    const { gateway, relay } = buildGateway();
    const { socket } = buildSocket('socket-1', {
      query: { token: 'test-token' },
    });
    gateway.handleConnection(socket);

    let releaseFirst: () => void = () => undefined;
    relay.handleFrame.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          releaseFirst = resolve;
        }),
    );

    const first = gateway.handleSignal(socket, 'first');
    const second = gateway.handleSignal(socket, 'second');
    await new Promise((resolve) => setImmediate(resolve));

    expect(relay.handleFrame).toHaveBeenCalledTimes(1);

    releaseFirst();
    await Promise.all([first, second]);

    expect(relay.handleFrame.mock.calls.map((call) => call[2])).toEqual([
      'first',
      'second',
    ]);
  });

  it('drops frames from sockets that never authenticated', async () => {
    const { gateway, relay } = buildGateway();
    const { stub, socket } = buildSocket('socket-1');

    await gateway.handleSignal(socket, '{}');

    expect(stub.disconnect).toHaveBeenCalledWith(true);
    expect(relay.handleFrame).not.toHaveBeenCalled();
  });

  it('reconciles call membership only when the last device leaves', () => {
    const { gateway, relay, registry } = buildGateway();
    const phone = buildSocket('socket-phone', { query: { token: 'test-token' } });
    const laptop = buildSocket('socket-laptop', {
      query: { token: 'test-token' },
    });
    gateway.handleConnection(phone.socket);
    gateway.handleConnection(laptop.socket);

    gateway.handleDisconnect(phone.socket);
    expect(relay.handleUserOffline).not.toHaveBeenCalled();
    expect(registry.isOnline(U1)).toBe(true);

    gateway.handleDisconnect(laptop.socket);
    expect(relay.handleUserOffline).toHaveBeenCalledWith(U1);
  });
});
