import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadListener, AdViewListener} from "./listeners";
import {AdKind} from "./types";
import {AdRequest, AdSize} from "./values";

export type BannerAdListener = AdLoadListener<BannerAd> & AdViewListener<BannerAd>;

export interface BannerAdOptions {
  readonly adUnitId: string;
  readonly size: AdSize;
  readonly request: AdRequest;
  readonly listener: BannerAdListener;
}

/**
 * Rectangular ad displayed through an AdWidget.
 */
export class BannerAd extends Ad {
  readonly kind: AdKind.BANNER = AdKind.BANNER;

  readonly size: AdSize;
  readonly request: AdRequest;
  readonly listener: BannerAdListener;

  constructor(options: BannerAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    this.size = options.size;
    this.request = options.request;
    this.listener = options.listener;
  }

  load(): Promise<void> {
    return this.manager.loadBannerAd(this);
  }
}
