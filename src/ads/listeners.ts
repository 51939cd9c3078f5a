import {AdError, LoadAdError, RewardItem} from "./values";

// Listeners are bundles of optional callbacks. Each ad kind accepts the
// intersection of the bundles for the events it can receive.

export type AdEventCallback<A> = (ad: A) => void;

export interface AdLoadListener<A> {
  // the ad finished loading and can be shown or mounted
  onAdLoaded?: AdEventCallback<A>;
  // the ad keeps its id until disposed, dispose it here unless retrying
  onAdFailedToLoad?: (ad: A, error: LoadAdError) => void;
}

export interface AdViewListener<A> {
  // an overlay covering the screen was opened
  onAdOpened?: AdEventCallback<A>;
  // ios only, the overlay is about to close
  onAdWillDismissScreen?: AdEventCallback<A>;
  onAdClosed?: AdEventCallback<A>;
  onAdImpression?: AdEventCallback<A>;
}

export interface AppEventListener<A> {
  onAppEvent?: (ad: A, name: string, data: string) => void;
}

export interface NativeClickListener<A> {
  onNativeAdClicked?: AdEventCallback<A>;
}

export interface FullScreenContentCallback<A> {
  onAdShowedFullScreenContent?: AdEventCallback<A>;
  onAdImpression?: AdEventCallback<A>;
  onAdFailedToShowFullScreenContent?: (ad: A, error: AdError) => void;
  onAdWillDismissFullScreenContent?: AdEventCallback<A>;
  onAdDismissedFullScreenContent?: AdEventCallback<A>;
}

/**
 * Load result of an ad without view. Both callbacks are required since
 * the ad is useless until one of them fires.
 */
export interface AdLoadCallback<A> {
  onAdLoaded: AdEventCallback<A>;
  onAdFailedToLoad: (error: LoadAdError) => void;
}

export type OnUserEarnedRewardCallback<A> = (ad: A, reward: RewardItem) => void;
