import {TypedEmitter} from "../helpers/events";
import {BridgeMethod} from "../messages";

export enum TransportEvent {
  AD_EVENT = 'adEvent',
}

export interface AdTransportEvents {
  // decoded onAdEvent message, validated by the registry
  adEvent: (message: unknown) => void;
}

/**
 * Request/acknowledge channel to the bridge plus the stream of ad events.
 */
export interface AdTransport extends TypedEmitter<AdTransportEvents> {
  readonly channelName: string;

  /**
   * Rejects with TransportError when the bridge refuses the request
   * or does not acknowledge it in time.
   */
  invokeMethod(method: BridgeMethod, args?: Record<string, unknown>): Promise<void>;

  close(): void;
}
