import {AdViewListener, FullScreenContentCallback} from "../ads/listeners";
import {AdKind, MobileAd} from "../ads/types";
import {AdError, LoadAdError, RewardItem} from "../ads/values";

/**
 * Listener callbacks of one ad with the ad already applied. A missing
 * entry means the ad kind, or this particular listener, does not
 * handle that event.
 */
export interface BoundCallbacks {
  onAdLoaded?: () => void;
  onAdFailedToLoad?: (error: LoadAdError) => void;
  onAdOpened?: () => void;
  onAdWillDismissScreen?: () => void;
  onAdClosed?: () => void;
  onAdImpression?: () => void;
  onNativeAdClicked?: () => void;
  onAppEvent?: (name: string, data: string) => void;
  onAdShowedFullScreenContent?: () => void;
  onAdFailedToShowFullScreenContent?: (error: AdError) => void;
  onAdWillDismissFullScreenContent?: () => void;
  onAdDismissedFullScreenContent?: () => void;
  onUserEarnedReward?: (reward: RewardItem) => void;
}

function bind<A, Args extends unknown[]>(
  ad: A,
  callback: ((ad: A, ...args: Args) => void) | undefined,
): ((...args: Args) => void) | undefined {
  return callback && ((...args: Args) => callback(ad, ...args));
}

function viewCallbacks<A>(ad: A, listener: AdViewListener<A>): BoundCallbacks {
  return {
    onAdOpened: bind(ad, listener.onAdOpened),
    onAdWillDismissScreen: bind(ad, listener.onAdWillDismissScreen),
    onAdClosed: bind(ad, listener.onAdClosed),
    onAdImpression: bind(ad, listener.onAdImpression),
  };
}

// read when the event arrives, the callback is set after load
function fullScreenCallbacks<A>(ad: A, callback: FullScreenContentCallback<A> | undefined): BoundCallbacks {
  return {
    onAdShowedFullScreenContent: bind(ad, callback?.onAdShowedFullScreenContent),
    onAdImpression: bind(ad, callback?.onAdImpression),
    onAdFailedToShowFullScreenContent: bind(ad, callback?.onAdFailedToShowFullScreenContent),
    onAdWillDismissFullScreenContent: bind(ad, callback?.onAdWillDismissFullScreenContent),
    onAdDismissedFullScreenContent: bind(ad, callback?.onAdDismissedFullScreenContent),
  };
}

export function bindCallbacks(ad: MobileAd): BoundCallbacks {
  switch (ad.kind) {
    case AdKind.BANNER:
      return {
        onAdLoaded: bind(ad, ad.listener.onAdLoaded),
        onAdFailedToLoad: bind(ad, ad.listener.onAdFailedToLoad),
        ...viewCallbacks(ad, ad.listener),
      };
    case AdKind.AD_MANAGER_BANNER:
      return {
        onAdLoaded: bind(ad, ad.listener.onAdLoaded),
        onAdFailedToLoad: bind(ad, ad.listener.onAdFailedToLoad),
        onAppEvent: bind(ad, ad.listener.onAppEvent),
        ...viewCallbacks(ad, ad.listener),
      };
    case AdKind.NATIVE:
      return {
        onAdLoaded: bind(ad, ad.listener.onAdLoaded),
        onAdFailedToLoad: bind(ad, ad.listener.onAdFailedToLoad),
        onNativeAdClicked: bind(ad, ad.listener.onNativeAdClicked),
        ...viewCallbacks(ad, ad.listener),
      };
    case AdKind.INTERSTITIAL:
      return {
        onAdLoaded: bind(ad, ad.adLoadCallback.onAdLoaded),
        onAdFailedToLoad: ad.adLoadCallback.onAdFailedToLoad,
        ...fullScreenCallbacks(ad, ad.fullScreenContentCallback),
      };
    case AdKind.AD_MANAGER_INTERSTITIAL:
      return {
        onAdLoaded: bind(ad, ad.adLoadCallback.onAdLoaded),
        onAdFailedToLoad: ad.adLoadCallback.onAdFailedToLoad,
        onAppEvent: bind(ad, ad.appEventListener?.onAppEvent),
        ...fullScreenCallbacks(ad, ad.fullScreenContentCallback),
      };
    case AdKind.REWARDED:
      return {
        onAdLoaded: bind(ad, ad.rewardedAdLoadCallback.onAdLoaded),
        onAdFailedToLoad: ad.rewardedAdLoadCallback.onAdFailedToLoad,
        onUserEarnedReward: bind(ad, ad.onUserEarnedRewardCallback),
        ...fullScreenCallbacks(ad, ad.fullScreenContentCallback),
      };
  }
}
