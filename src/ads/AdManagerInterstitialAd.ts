import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadCallback, AppEventListener, FullScreenContentCallback} from "./listeners";
import {AdKind} from "./types";
import {AdManagerAdRequest} from "./values";

export interface AdManagerInterstitialAdOptions {
  readonly adUnitId: string;
  readonly request: AdManagerAdRequest;
  readonly adLoadCallback: AdLoadCallback<AdManagerInterstitialAd>;
}

/** Interstitial served by ad manager, it also receives app events from the creative. */
export class AdManagerInterstitialAd extends Ad {
  readonly kind: AdKind.AD_MANAGER_INTERSTITIAL = AdKind.AD_MANAGER_INTERSTITIAL;

  readonly request: AdManagerAdRequest;
  readonly adLoadCallback: AdLoadCallback<AdManagerInterstitialAd>;

  fullScreenContentCallback?: FullScreenContentCallback<AdManagerInterstitialAd>;
  appEventListener?: AppEventListener<AdManagerInterstitialAd>;

  constructor(options: AdManagerInterstitialAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    this.request = options.request;
    this.adLoadCallback = options.adLoadCallback;
  }

  load(): Promise<void> {
    return this.manager.loadAdManagerInterstitialAd(this);
  }

  show(): Promise<void> {
    return this.manager.showAdWithoutView(this);
  }
}
