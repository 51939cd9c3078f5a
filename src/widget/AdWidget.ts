import {Logger} from "winston";
import {AdWithView} from "../ads/types";
import {PreconditionViolationError} from "../errors";
import {componentLogger} from "../logger";
import {AdInstanceManager} from "../registry/AdInstanceManager";
import {AdId} from "../types";

export interface PlatformViewParams {
  readonly viewType: string;
  // the host resolves the native view of the ad from its id
  readonly creationParams: AdId;
}

/**
 * Attaches a loaded view ad to the host UI. An ad can be mounted by
 * one widget at a time.
 */
export class AdWidget {
  private readonly logger: Logger;
  private mountedAdId: AdId | null = null;

  constructor(
    readonly ad: AdWithView,
    private readonly manager: AdInstanceManager,
  ) {
    this.logger = componentLogger('ad_widget');
  }

  get isMounted(): boolean {
    return this.liveAdId() !== null;
  }

  mount() {
    const adId = this.manager.adIdFor(this.ad);

    if (adId === null) {
      throw new PreconditionViolationError(
        'AdWidget requires Ad.load to be called before AdWidget is inserted into the tree\n' +
        'Parameter ad is not loaded. Call Ad.load before AdWidget is inserted into the tree.',
        { adUnitId: this.ad.adUnitId },
      );
    }

    if (this.manager.isWidgetAdIdMounted(adId)) {
      throw new PreconditionViolationError(
        'This AdWidget is already in the Widget tree\n' +
        'If you placed this AdWidget in a list, make sure you create a new instance in the builder function with a unique ad object.\n' +
        'Make sure you are not using the same ad object in more than one AdWidget.',
        { adId },
      );
    }

    this.manager.mountWidgetAdId(adId);
    this.mountedAdId = adId;

    this.logger.debug(`mounted ad ${adId}`);
  }

  unmount() {
    if (this.mountedAdId === null) {
      return;
    }

    this.manager.unmountWidgetAdId(this.mountedAdId);
    this.logger.debug(`unmounted ad ${this.mountedAdId}`);
    this.mountedAdId = null;
  }

  build(): PlatformViewParams {
    if (this.mountedAdId === null) {
      throw new PreconditionViolationError('AdWidget must be mounted before it is built', {
        adUnitId: this.ad.adUnitId,
      });
    }

    const adId = this.liveAdId();
    if (adId === null) {
      throw new PreconditionViolationError('The ad of this AdWidget was disposed after it was mounted', {
        adId: this.mountedAdId,
        adUnitId: this.ad.adUnitId,
      });
    }

    return {
      viewType: `${this.manager.channelName}/ad_widget`,
      creationParams: adId,
    };
  }

  // dispose releases the mount in the registry, not here
  private liveAdId(): AdId | null {
    const adId = this.mountedAdId;

    if (adId === null || this.manager.adIdFor(this.ad) !== adId || !this.manager.isWidgetAdIdMounted(adId)) {
      return null;
    }

    return adId;
  }
}
