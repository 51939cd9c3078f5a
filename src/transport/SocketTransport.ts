import {io} from "socket.io-client";
import {Logger} from "winston";
import {adMessageCodec} from "../codec";
import {MessageCodec} from "../codec/MessageCodec";
import {BridgeConfig} from "../config";
import {TransportError} from "../errors";
import {TypedEventEmitter} from "../helpers/events";
import {promiseTimeout} from "../helpers/promises";
import {componentLogger} from "../logger";
import {BridgeMessage, BridgeMethod, BridgeSocket} from "../messages";
import {AdTransport, AdTransportEvents, TransportEvent} from "./types";

/**
 * Talks to the bridge over a socket.io namespace named after the channel.
 * Arguments and events cross the socket encoded by the message codec.
 */
export class SocketTransport extends TypedEventEmitter<AdTransportEvents> implements AdTransport {
  private readonly logger: Logger;
  private readonly ws: BridgeSocket;

  constructor(
    private readonly config: BridgeConfig['transport'],
    private readonly codec: MessageCodec = adMessageCodec,
  ) {
    super();

    this.logger = componentLogger('transport');

    const url = `${config.url}/${config.channel}`;
    this.logger.info(`connect to bridge at ${url}`);

    this.ws = io(url, {
      timeout: config.timeout,
    });

    this.ws.on('connect', () => {
      this.logger.info('connected to bridge');
    });

    this.ws.on('connect_error', error => {
      this.logger.warn(`connection to bridge failed (${error.message})`, { error });
    });

    this.ws.on('disconnect', reason => {
      this.logger.info(`disconnected from bridge (${reason})`);
    });

    this.ws.on(BridgeMessage.AD_EVENT, this.onAdEvent);
  }

  get channelName(): string {
    return this.config.channel;
  }

  invokeMethod(method: BridgeMethod, args?: Record<string, unknown>): Promise<void> {
    let encoded: Buffer;
    try {
      encoded = this.codec.encode(args ?? null);
    } catch (error) {
      return Promise.reject(error);
    }

    const request = new Promise<void>((resolve, reject) => {
      this.ws.emit(BridgeMessage.INVOKE, method, encoded, error => {
        // some bridges acknowledge without argument
        if (typeof error === 'string') {
          reject(new TransportError(`Bridge rejected ${method}: ${error}`, method));
          return;
        }

        resolve();
      });
    });

    return promiseTimeout(request, this.config.timeout, () => {
      return new TransportError(`${method} not acknowledged after ${this.config.timeout}ms`, method, {
        timeout: this.config.timeout,
      });
    });
  }

  close() {
    this.logger.info('close bridge connection');

    this.removeAllListeners();
    this.ws.off(BridgeMessage.AD_EVENT, this.onAdEvent);
    this.ws.disconnect();
  }

  private readonly onAdEvent = (data: Buffer): void => {
    let message: unknown;

    try {
      message = this.codec.decode(data);
    } catch (error) {
      this.logger.error('could not decode ad event', { error, size: data.length });
      throw error;
    }

    this.emit(TransportEvent.AD_EVENT, message);
  };
}
