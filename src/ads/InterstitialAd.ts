import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadCallback, FullScreenContentCallback} from "./listeners";
import {AdKind} from "./types";
import {AdRequest} from "./values";

export interface InterstitialAdOptions {
  readonly adUnitId: string;
  readonly request: AdRequest;
  readonly adLoadCallback: AdLoadCallback<InterstitialAd>;
}

/**
 * Full screen ad shown at natural transition points of the app.
 */
export class InterstitialAd extends Ad {
  readonly kind: AdKind.INTERSTITIAL = AdKind.INTERSTITIAL;

  readonly request: AdRequest;
  readonly adLoadCallback: AdLoadCallback<InterstitialAd>;

  // set before show() to follow the full screen lifecycle
  fullScreenContentCallback?: FullScreenContentCallback<InterstitialAd>;

  constructor(options: InterstitialAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    this.request = options.request;
    this.adLoadCallback = options.adLoadCallback;
  }

  load(): Promise<void> {
    return this.manager.loadInterstitialAd(this);
  }

  /**
   * Throws PreconditionViolationError when the ad was never loaded.
   */
  show(): Promise<void> {
    return this.manager.showAdWithoutView(this);
  }
}
