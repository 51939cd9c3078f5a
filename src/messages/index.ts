import {Socket} from "socket.io-client";
import {EventsDefinition} from "../helpers/events";

/**
 * Requests understood by the bridge. Each one is acknowledged once the
 * bridge accepted it, never when the ad is ready.
 */
export enum BridgeMethod {
  UPDATE_REQUEST_CONFIGURATION = 'MobileAds#updateRequestConfiguration',
  SET_SAME_APP_KEY_ENABLED = 'MobileAds#setSameAppKeyEnabled',
  LOAD_BANNER_AD = 'loadBannerAd',
  LOAD_AD_MANAGER_BANNER_AD = 'loadAdManagerBannerAd',
  LOAD_NATIVE_AD = 'loadNativeAd',
  LOAD_INTERSTITIAL_AD = 'loadInterstitialAd',
  LOAD_AD_MANAGER_INTERSTITIAL_AD = 'loadAdManagerInterstitialAd',
  LOAD_REWARDED_AD = 'loadRewardedAd',
  SHOW_AD_WITHOUT_VIEW = 'showAdWithoutView',
  DISPOSE_AD = 'disposeAd',
}

export enum BridgeMessage {
  INVOKE = 'invoke', // client -> bridge
  AD_EVENT = 'onAdEvent', // bridge -> client
}

// payloads travel encoded by the ad message codec
export interface BridgeServerMessages extends EventsDefinition<BridgeMessage.AD_EVENT> {
  onAdEvent: (message: Buffer) => void;
}

export interface BridgeClientMessages extends EventsDefinition<BridgeMessage.INVOKE> {
  invoke: (method: BridgeMethod, args: Buffer, ack: (error?: string | null) => void) => void;
}

export type BridgeSocket = Socket<BridgeServerMessages, BridgeClientMessages>;
