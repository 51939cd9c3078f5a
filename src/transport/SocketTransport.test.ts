import {EventEmitter} from "events";
import {io} from "socket.io-client";
import {adMessageCodec} from "../codec";
import {ProtocolViolationError, TransportError} from "../errors";
import {BridgeMethod} from "../messages";
import {SocketTransport} from "./SocketTransport";
import {TransportEvent} from "./types";

class FakeSocket extends EventEmitter {
  readonly invokes: Array<{ method: unknown; args: unknown }> = [];
  // undefined acknowledges without argument
  ackWith: string | null | undefined = null;
  // leaves requests unacknowledged
  silent = false;
  disconnected = false;

  emit(event: string | symbol, ...args: unknown[]): boolean {
    if (event === 'invoke' && Buffer.isBuffer(args[1])) {
      this.invokes.push({ method: args[0], args: adMessageCodec.decode(args[1]) });
    }

    const ack = args[args.length - 1];
    if (typeof ack === 'function' && !this.silent) {
      if (this.ackWith === undefined) {
        ack();
      } else {
        ack(this.ackWith);
      }
    }

    return true;
  }

  // message coming from the bridge
  receive(event: string, ...args: unknown[]): boolean {
    return super.emit(event, ...args);
  }

  disconnect() {
    this.disconnected = true;
    return this;
  }
}

let mockSocket: FakeSocket;

jest.mock('socket.io-client', () => ({
  io: jest.fn(() => mockSocket),
}));

describe('Transport :: SocketTransport', () => {
  const config = {
    url: 'http://bridge.example.com',
    channel: 'test_channel',
    timeout: 50,
  };

  let transport: SocketTransport;

  beforeEach(() => {
    mockSocket = new FakeSocket();
    transport = new SocketTransport(config);
  });

  afterEach(() => {
    transport.close();
  });

  test('Connects to the channel namespace', () => {
    expect(io).toHaveBeenLastCalledWith('http://bridge.example.com/test_channel', { timeout: 50 });
    expect(transport.channelName).toBe('test_channel');
  });

  test('Sends encoded requests', async () => {
    await transport.invokeMethod(BridgeMethod.DISPOSE_AD, { adId: 4 });
    await transport.invokeMethod(BridgeMethod.SHOW_AD_WITHOUT_VIEW);

    expect(mockSocket.invokes).toEqual([
      { method: 'disposeAd', args: { adId: 4 } },
      { method: 'showAdWithoutView', args: null },
    ]);
  });

  test('Rejects on error acknowledgement', async () => {
    mockSocket.ackWith = 'unknown ad';

    const request = transport.invokeMethod(BridgeMethod.DISPOSE_AD, { adId: 4 });

    await expect(request).rejects.toThrow(TransportError);
    await expect(request).rejects.toThrow('Bridge rejected disposeAd: unknown ad');
  });

  test('Resolves on acknowledgement without argument', async () => {
    mockSocket.ackWith = undefined;

    await expect(transport.invokeMethod(BridgeMethod.DISPOSE_AD, { adId: 4 })).resolves.toBeUndefined();
  });

  test('Rejects arguments that can not be encoded without sending them', async () => {
    const request = transport.invokeMethod(BridgeMethod.LOAD_NATIVE_AD, { customOptions: { when: new Date(0) } });

    await expect(request).rejects.toThrow(ProtocolViolationError);
    expect(mockSocket.invokes).toEqual([]);
  });

  test('Rejects when not acknowledged in time', async () => {
    mockSocket.silent = true;

    await expect(transport.invokeMethod(BridgeMethod.LOAD_BANNER_AD, { adId: 0 }))
      .rejects.toThrow('loadBannerAd not acknowledged after 50ms');
  });

  test('Emits decoded ad events', () => {
    const listener = jest.fn();
    transport.on(TransportEvent.AD_EVENT, listener);

    mockSocket.receive('onAdEvent', adMessageCodec.encode({ adId: 2, eventName: 'onAdClosed' }));

    expect(listener).toHaveBeenCalledWith({ adId: 2, eventName: 'onAdClosed' });
  });

  test('Undecodable events are protocol violations', () => {
    const listener = jest.fn();
    transport.on(TransportEvent.AD_EVENT, listener);

    expect(() => mockSocket.receive('onAdEvent', Buffer.from([200]))).toThrow(ProtocolViolationError);
    expect(listener).not.toHaveBeenCalled();
  });

  test('Connection errors are not fatal', () => {
    expect(() => mockSocket.receive('connect_error', new Error('refused'))).not.toThrow();
    expect(() => mockSocket.receive('disconnect', 'io server disconnect')).not.toThrow();
  });

  test('close() disconnects and stops events', () => {
    const listener = jest.fn();
    transport.on(TransportEvent.AD_EVENT, listener);

    transport.close();
    mockSocket.receive('onAdEvent', adMessageCodec.encode({ adId: 2, eventName: 'onAdClosed' }));

    expect(mockSocket.disconnected).toBe(true);
    expect(listener).not.toHaveBeenCalled();
  });
});
