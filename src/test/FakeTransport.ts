import {adMessageCodec} from "../codec";
import {TypedEventEmitter} from "../helpers/events";
import {BridgeMethod} from "../messages";
import {AdTransport, AdTransportEvents, TransportEvent} from "../transport/types";

export interface MethodCall {
  readonly method: BridgeMethod;
  readonly args: unknown;
}

/**
 * In process bridge. Requests and events go through the message codec
 * so tests see what the remote side would.
 */
export class FakeTransport extends TypedEventEmitter<AdTransportEvents> implements AdTransport {
  readonly log: MethodCall[] = [];
  closed = false;

  // next requests fail with this error
  rejectWith: Error | null = null;

  constructor(readonly channelName = 'test_channel') {
    super();
  }

  invokeMethod(method: BridgeMethod, args?: Record<string, unknown>): Promise<void> {
    let decoded: unknown;
    try {
      decoded = adMessageCodec.decode(adMessageCodec.encode(args ?? null));
    } catch (error) {
      return Promise.reject(error);
    }

    this.log.push({ method, args: decoded });

    if (this.rejectWith) {
      return Promise.reject(this.rejectWith);
    }

    return Promise.resolve();
  }

  deliver(message: Record<string, unknown>) {
    this.emit(TransportEvent.AD_EVENT, adMessageCodec.decode(adMessageCodec.encode(message)));
  }

  close() {
    this.closed = true;
    this.removeAllListeners();
  }
}
