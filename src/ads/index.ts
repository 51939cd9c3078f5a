export * from "./types";
export * from "./listeners";
export * from "./values";
export {Ad} from "./Ad";
export * from "./BannerAd";
export * from "./AdManagerBannerAd";
export * from "./NativeAd";
export * from "./InterstitialAd";
export * from "./AdManagerInterstitialAd";
export * from "./RewardedAd";
