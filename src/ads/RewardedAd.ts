import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadCallback, FullScreenContentCallback, OnUserEarnedRewardCallback} from "./listeners";
import {AdKind} from "./types";
import {AdManagerAdRequest, AdRequest, ServerSideVerificationOptions} from "./values";

interface RewardedAdBaseOptions {
  readonly adUnitId: string;
  readonly rewardedAdLoadCallback: AdLoadCallback<RewardedAd>;
  readonly serverSideVerificationOptions?: ServerSideVerificationOptions;
}

export type RewardedAdOptions =
  | RewardedAdBaseOptions & { readonly request: AdRequest }
  | RewardedAdBaseOptions & { readonly adManagerRequest: AdManagerAdRequest };

/**
 * Full screen ad granting the user a reward once watched.
 */
export class RewardedAd extends Ad {
  readonly kind: AdKind.REWARDED = AdKind.REWARDED;

  readonly rewardedAdLoadCallback: AdLoadCallback<RewardedAd>;
  readonly serverSideVerificationOptions: ServerSideVerificationOptions | null;
  readonly request: AdRequest | null;
  readonly adManagerRequest: AdManagerAdRequest | null;

  fullScreenContentCallback?: FullScreenContentCallback<RewardedAd>;
  onUserEarnedRewardCallback?: OnUserEarnedRewardCallback<RewardedAd>;

  constructor(options: RewardedAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    this.rewardedAdLoadCallback = options.rewardedAdLoadCallback;
    this.serverSideVerificationOptions = options.serverSideVerificationOptions ?? null;

    if ('request' in options) {
      this.request = options.request;
      this.adManagerRequest = null;
    } else {
      this.request = null;
      this.adManagerRequest = options.adManagerRequest;
    }
  }

  static fromAdManagerRequest(
    options: RewardedAdBaseOptions & { readonly adManagerRequest: AdManagerAdRequest },
    manager: AdInstanceManager,
  ): RewardedAd {
    return new RewardedAd(options, manager);
  }

  load(): Promise<void> {
    return this.manager.loadRewardedAd(this);
  }

  show(options: { onUserEarnedReward: OnUserEarnedRewardCallback<RewardedAd> }): Promise<void> {
    this.onUserEarnedRewardCallback = options.onUserEarnedReward;
    return this.manager.showAdWithoutView(this);
  }
}
