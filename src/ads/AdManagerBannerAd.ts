import {PreconditionViolationError} from "../errors";
import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadListener, AdViewListener, AppEventListener} from "./listeners";
import {AdKind} from "./types";
import {AdManagerAdRequest, AdSize} from "./values";

export type AdManagerBannerAdListener =
  & AdLoadListener<AdManagerBannerAd>
  & AdViewListener<AdManagerBannerAd>
  & AppEventListener<AdManagerBannerAd>;

export interface AdManagerBannerAdOptions {
  readonly adUnitId: string;
  // the remote sdk picks one of them
  readonly sizes: readonly AdSize[];
  readonly request: AdManagerAdRequest;
  readonly listener: AdManagerBannerAdListener;
}

/**
 * Banner served by ad manager. Can receive app events from the creative.
 */
export class AdManagerBannerAd extends Ad {
  readonly kind: AdKind.AD_MANAGER_BANNER = AdKind.AD_MANAGER_BANNER;

  readonly sizes: readonly AdSize[];
  readonly request: AdManagerAdRequest;
  readonly listener: AdManagerBannerAdListener;

  constructor(options: AdManagerBannerAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    if (!options.sizes.length) {
      throw new PreconditionViolationError('AdManagerBannerAd requires at least one size', {
        adUnitId: options.adUnitId,
      });
    }

    this.sizes = [...options.sizes];
    this.request = options.request;
    this.listener = options.listener;
  }

  load(): Promise<void> {
    return this.manager.loadAdManagerBannerAd(this);
  }
}
