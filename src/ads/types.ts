import {BannerAd} from "./BannerAd";
import {AdManagerBannerAd} from "./AdManagerBannerAd";
import {NativeAd} from "./NativeAd";
import {InterstitialAd} from "./InterstitialAd";
import {AdManagerInterstitialAd} from "./AdManagerInterstitialAd";
import {RewardedAd} from "./RewardedAd";

export enum AdKind {
  BANNER = 'banner',
  AD_MANAGER_BANNER = 'adManagerBanner',
  NATIVE = 'native',
  INTERSTITIAL = 'interstitial',
  AD_MANAGER_INTERSTITIAL = 'adManagerInterstitial',
  REWARDED = 'rewarded',
}

export type MobileAd =
  | BannerAd
  | AdManagerBannerAd
  | NativeAd
  | InterstitialAd
  | AdManagerInterstitialAd
  | RewardedAd;

// ads rendered through an AdWidget
export type AdWithView = BannerAd | AdManagerBannerAd | NativeAd;

// ads shown full screen by the remote sdk
export type AdWithoutView = InterstitialAd | AdManagerInterstitialAd | RewardedAd;
