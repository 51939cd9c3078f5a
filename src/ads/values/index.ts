export {AdError, LoadAdError, ResponseInfo, ResponseInfoOptions} from "./AdError";
export {AdRequest, AdRequestOptions, AdManagerAdRequest, AdManagerAdRequestOptions} from "./AdRequest";
export {AdSize, Orientation} from "./AdSize";
export {RewardItem} from "./RewardItem";
export {ServerSideVerificationOptions} from "./ServerSideVerificationOptions";
export {
  MaxAdContentRating,
  RequestConfiguration,
  RequestConfigurationOptions,
  TagForChildDirectedTreatment,
  TagForUnderAgeOfConsent,
} from "./RequestConfiguration";
