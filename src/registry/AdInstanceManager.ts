import {Logger} from "winston";
import {Ad} from "../ads/Ad";
import {AdManagerBannerAd} from "../ads/AdManagerBannerAd";
import {AdManagerInterstitialAd} from "../ads/AdManagerInterstitialAd";
import {BannerAd} from "../ads/BannerAd";
import {InterstitialAd} from "../ads/InterstitialAd";
import {NativeAd} from "../ads/NativeAd";
import {RewardedAd} from "../ads/RewardedAd";
import {MobileAd} from "../ads/types";
import {RequestConfiguration} from "../ads/values";
import {PreconditionViolationError, ProtocolViolationError} from "../errors";
import {componentLogger} from "../logger";
import {BridgeMethod} from "../messages";
import {AdTransport, TransportEvent} from "../transport/types";
import {AdId} from "../types";
import {Collection} from "../util/Collection";
import {bindCallbacks} from "./callbacks";
import {AdEvent, AdEventName, adErrorOf, appEventOf, loadAdErrorOf, parseAdEvent, rewardItemOf} from "./events";

export interface AdInstanceManagerOptions {
  // dispose an ad as soon as its load failed
  readonly disposeOnLoadFailure: boolean;
}

/**
 * Keeps track of the ads known to the bridge: assigns their ids, sends
 * their requests and routes the bridge events back to their listeners.
 */
export class AdInstanceManager {
  private readonly logger: Logger;

  // live ads, an id is never reused once removed
  private readonly ads = new Collection<AdId, MobileAd>();
  // ids attached to an AdWidget
  private readonly mounted = new Set<AdId>();
  // ids for which onAdLoaded was received
  private readonly loaded = new Set<AdId>();
  private nextAdId: AdId = 0;

  constructor(
    private readonly transport: AdTransport,
    private readonly options: AdInstanceManagerOptions = { disposeOnLoadFailure: false },
  ) {
    this.logger = componentLogger('registry');

    this.transport.on(TransportEvent.AD_EVENT, this.onAdEvent);
  }

  get channelName(): string {
    return this.transport.channelName;
  }

  registerNewAdId(ad: MobileAd): AdId {
    const adId = this.nextAdId++;
    this.ads.add(adId, ad);
    return adId;
  }

  adIdFor(ad: Ad): AdId | null {
    return this.ads.keyOf(ad);
  }

  adFor(adId: AdId): MobileAd | null {
    return this.ads.get(adId);
  }

  onAdLoadedCalled(ad: Ad): boolean {
    const adId = this.adIdFor(ad);
    return adId !== null && this.loaded.has(adId);
  }

  /**
   * The id is released right away, events still in flight for it are
   * dropped. The returned promise only tracks the bridge request.
   */
  disposeAd(ad: Ad): Promise<void> {
    const adId = this.adIdFor(ad);
    if (adId === null) {
      return Promise.resolve();
    }

    const request = this.transport.invokeMethod(BridgeMethod.DISPOSE_AD, { adId });

    this.releaseAdId(adId);
    this.logger.debug(`disposed ad ${adId}`, { adId, adUnitId: ad.adUnitId });

    return request;
  }

  mountWidgetAdId(adId: AdId) {
    if (this.mounted.has(adId)) {
      throw new PreconditionViolationError(`Ad ${adId} is already mounted`, { adId });
    }

    if (!this.ads.get(adId)) {
      throw new PreconditionViolationError(`Ad ${adId} is not loaded`, { adId });
    }

    this.mounted.add(adId);
  }

  unmountWidgetAdId(adId: AdId) {
    this.mounted.delete(adId);
  }

  isWidgetAdIdMounted(adId: AdId): boolean {
    return this.mounted.has(adId);
  }

  loadBannerAd(ad: BannerAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_BANNER_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
      size: ad.size,
    }));
  }

  loadAdManagerBannerAd(ad: AdManagerBannerAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_AD_MANAGER_BANNER_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
      sizes: ad.sizes,
    }));
  }

  loadNativeAd(ad: NativeAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_NATIVE_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
      adManagerRequest: ad.adManagerRequest,
      factoryId: ad.factoryId,
      customOptions: ad.customOptions,
    }));
  }

  loadInterstitialAd(ad: InterstitialAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_INTERSTITIAL_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
    }));
  }

  loadAdManagerInterstitialAd(ad: AdManagerInterstitialAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_AD_MANAGER_INTERSTITIAL_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
    }));
  }

  loadRewardedAd(ad: RewardedAd): Promise<void> {
    return this.load(ad, BridgeMethod.LOAD_REWARDED_AD, adId => ({
      adId,
      adUnitId: ad.adUnitId,
      request: ad.request,
      adManagerRequest: ad.adManagerRequest,
      serverSideVerificationOptions: ad.serverSideVerificationOptions,
    }));
  }

  /**
   * Throws synchronously when the ad was never loaded, nothing is sent
   * to the bridge in that case.
   */
  showAdWithoutView(ad: Ad): Promise<void> {
    const adId = this.adIdFor(ad);
    if (adId === null) {
      throw new PreconditionViolationError('Ad has not been loaded or has already been disposed', {
        adUnitId: ad.adUnitId,
      });
    }

    return this.transport.invokeMethod(BridgeMethod.SHOW_AD_WITHOUT_VIEW, { adId });
  }

  updateRequestConfiguration(configuration: RequestConfiguration): Promise<void> {
    return this.transport.invokeMethod(BridgeMethod.UPDATE_REQUEST_CONFIGURATION, configuration.toArguments());
  }

  setSameAppKeyEnabled(isEnabled: boolean): Promise<void> {
    return this.transport.invokeMethod(BridgeMethod.SET_SAME_APP_KEY_ENABLED, { isEnabled });
  }

  /**
   * Stops listening to the bridge and forgets every ad.
   */
  close() {
    this.transport.off(TransportEvent.AD_EVENT, this.onAdEvent);

    this.logger.info(`close registry with ${this.ads.count()} live ads`);

    this.ads.clear();
    this.mounted.clear();
    this.loaded.clear();
  }

  private load(ad: MobileAd, method: BridgeMethod, buildArgs: (adId: AdId) => Record<string, unknown>): Promise<void> {
    const existing = this.adIdFor(ad);
    if (existing !== null) {
      this.logger.warn(`ad ${existing} is already loading, skip ${method}`, {
        adId: existing,
        adUnitId: ad.adUnitId,
      });
      return Promise.resolve();
    }

    const adId = this.registerNewAdId(ad);
    this.logger.debug(`${method} for ad ${adId}`, { adId, adUnitId: ad.adUnitId });

    // a refused load leaves nothing on the bridge, the ad may load again
    return this.transport.invokeMethod(method, buildArgs(adId)).catch(error => {
      if (this.adIdFor(ad) === adId) {
        this.releaseAdId(adId);
      }

      this.logger.warn(`${method} for ad ${adId} failed`, { adId, adUnitId: ad.adUnitId, error });
      throw error;
    });
  }

  private releaseAdId(adId: AdId) {
    this.ads.remove(adId);
    this.mounted.delete(adId);
    this.loaded.delete(adId);
  }

  private readonly onAdEvent = (message: unknown): void => {
    const event = parseAdEvent(message);

    const ad = this.adFor(event.adId);
    if (!ad) {
      this.logger.debug(`drop ${event.eventName} for unknown ad ${event.adId}`);
      return;
    }

    this.dispatch(ad, event);
  };

  private dispatch(ad: MobileAd, event: AdEvent) {
    const callbacks = bindCallbacks(ad);

    switch (event.eventName) {
      case AdEventName.AD_LOADED:
        this.loaded.add(event.adId);
        callbacks.onAdLoaded?.();
        break;
      case AdEventName.AD_FAILED_TO_LOAD:
        callbacks.onAdFailedToLoad?.(loadAdErrorOf(event));
        if (this.options.disposeOnLoadFailure) {
          this.disposeFailedAd(ad, event.adId);
        }
        break;
      case AdEventName.AD_OPENED:
        callbacks.onAdOpened?.();
        break;
      case AdEventName.AD_WILL_DISMISS_SCREEN:
        callbacks.onAdWillDismissScreen?.();
        break;
      case AdEventName.AD_CLOSED:
        callbacks.onAdClosed?.();
        break;
      case AdEventName.AD_IMPRESSION:
        callbacks.onAdImpression?.();
        break;
      case AdEventName.NATIVE_AD_CLICKED:
        callbacks.onNativeAdClicked?.();
        break;
      case AdEventName.APP_EVENT: {
        const {name, data} = appEventOf(event);
        callbacks.onAppEvent?.(name, data);
        break;
      }
      case AdEventName.AD_SHOWED_FULL_SCREEN_CONTENT:
        callbacks.onAdShowedFullScreenContent?.();
        break;
      case AdEventName.AD_FAILED_TO_SHOW_FULL_SCREEN_CONTENT:
        callbacks.onAdFailedToShowFullScreenContent?.(adErrorOf(event));
        break;
      case AdEventName.AD_WILL_DISMISS_FULL_SCREEN_CONTENT:
        callbacks.onAdWillDismissFullScreenContent?.();
        break;
      case AdEventName.AD_DISMISSED_FULL_SCREEN_CONTENT:
        callbacks.onAdDismissedFullScreenContent?.();
        break;
      case AdEventName.REWARDED_AD_USER_EARNED_REWARD:
        callbacks.onUserEarnedReward?.(rewardItemOf(event));
        break;
      default: {
        const unknown: never = event.eventName;
        throw new ProtocolViolationError(`Unhandled ad event ${unknown}`, { adId: event.adId });
      }
    }
  }

  // the listener may already have disposed or reloaded the ad
  private disposeFailedAd(ad: MobileAd, adId: AdId) {
    if (this.adIdFor(ad) !== adId) {
      return;
    }

    this.disposeAd(ad).catch(error => {
      this.logger.error(`dispose of failed ad ${adId} was rejected`, { adId, error });
    });
  }
}
