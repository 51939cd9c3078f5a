export {MobileAds} from "./MobileAds";
export * from "./ads";
export {AdInstanceManager, AdInstanceManagerOptions} from "./registry/AdInstanceManager";
export {AdEventName} from "./registry/events";
export {AdTransport, AdTransportEvents, TransportEvent} from "./transport/types";
export {SocketTransport} from "./transport/SocketTransport";
export {AdWidget, PlatformViewParams} from "./widget/AdWidget";
export {BridgeMethod} from "./messages";
export * from "./codec";
export * from "./errors";
export {BridgeConfig, DEFAULT_BRIDGE_CONFIG, validateBridgeConfig} from "./config";
export {AdId} from "./types";
