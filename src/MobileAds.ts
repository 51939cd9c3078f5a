import {Logger} from "winston";
import {AdManagerBannerAd, AdManagerBannerAdOptions} from "./ads/AdManagerBannerAd";
import {AdManagerInterstitialAd, AdManagerInterstitialAdOptions} from "./ads/AdManagerInterstitialAd";
import {BannerAd, BannerAdOptions} from "./ads/BannerAd";
import {InterstitialAd, InterstitialAdOptions} from "./ads/InterstitialAd";
import {NativeAd, NativeAdOptions} from "./ads/NativeAd";
import {RewardedAd, RewardedAdOptions} from "./ads/RewardedAd";
import {AdWithView} from "./ads/types";
import {RequestConfiguration} from "./ads/values";
import {BridgeConfig, validateBridgeConfig} from "./config";
import {componentLogger, createLogger} from "./logger";
import {AdInstanceManager} from "./registry/AdInstanceManager";
import {SocketTransport} from "./transport/SocketTransport";
import {AdTransport} from "./transport/types";
import {AdWidget} from "./widget/AdWidget";

/**
 * Entry point of the library: owns the bridge connection and the ad
 * registry, and creates ads bound to them.
 */
export class MobileAds {
  private readonly logger: Logger;
  private readonly config: BridgeConfig;
  private readonly transport: AdTransport;
  private readonly manager: AdInstanceManager;

  constructor(_config: string | object, transport?: AdTransport) {
    const config = this.config = validateBridgeConfig(_config);

    createLogger(config.log, {
      app: 'mobile-ads-bridge',
      env: config.env,
      version: process.env.npm_package_version ?? 'dev',
    });
    this.logger = componentLogger('mobile_ads');

    this.logger.info("Initialize mobile ads");

    this.transport = transport ?? new SocketTransport(config.transport);
    this.manager = new AdInstanceManager(this.transport, config.ads);
  }

  get instanceManager(): AdInstanceManager {
    return this.manager;
  }

  createBannerAd(options: BannerAdOptions): BannerAd {
    return new BannerAd(options, this.manager);
  }

  createAdManagerBannerAd(options: AdManagerBannerAdOptions): AdManagerBannerAd {
    return new AdManagerBannerAd(options, this.manager);
  }

  createNativeAd(options: NativeAdOptions): NativeAd {
    return new NativeAd(options, this.manager);
  }

  createInterstitialAd(options: InterstitialAdOptions): InterstitialAd {
    return new InterstitialAd(options, this.manager);
  }

  createAdManagerInterstitialAd(options: AdManagerInterstitialAdOptions): AdManagerInterstitialAd {
    return new AdManagerInterstitialAd(options, this.manager);
  }

  createRewardedAd(options: RewardedAdOptions): RewardedAd {
    return new RewardedAd(options, this.manager);
  }

  createAdWidget(ad: AdWithView): AdWidget {
    return new AdWidget(ad, this.manager);
  }

  updateRequestConfiguration(configuration: RequestConfiguration): Promise<void> {
    return this.manager.updateRequestConfiguration(configuration);
  }

  setSameAppKeyEnabled(isEnabled: boolean): Promise<void> {
    return this.manager.setSameAppKeyEnabled(isEnabled);
  }

  close() {
    this.logger.info("Close mobile ads");

    this.manager.close();
    this.transport.close();
  }
}
