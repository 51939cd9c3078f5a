import {PreconditionViolationError} from "../errors";
import {FakeTransport} from "../test/FakeTransport";
import {AdInstanceManager} from "../registry/AdInstanceManager";
import {BridgeMethod} from "../messages";
import {AdManagerBannerAd} from "./AdManagerBannerAd";
import {BannerAd} from "./BannerAd";
import {InterstitialAd} from "./InterstitialAd";
import {NativeAd} from "./NativeAd";
import {RewardedAd} from "./RewardedAd";
import {AdKind} from "./types";
import {AdManagerAdRequest, AdRequest, AdSize, ServerSideVerificationOptions} from "./values";

describe('Ads :: Entities', () => {
  let transport: FakeTransport;
  let manager: AdInstanceManager;

  beforeEach(() => {
    transport = new FakeTransport();
    manager = new AdInstanceManager(transport);
  });

  test('Each entity carries its kind', () => {
    const banner = new BannerAd({ adUnitId: 'a', size: AdSize.banner, request: new AdRequest(), listener: {} }, manager);
    const interstitial = new InterstitialAd({
      adUnitId: 'b',
      request: new AdRequest(),
      adLoadCallback: { onAdLoaded: jest.fn(), onAdFailedToLoad: jest.fn() },
    }, manager);

    expect(banner.kind).toBe(AdKind.BANNER);
    expect(interstitial.kind).toBe(AdKind.INTERSTITIAL);
    expect(banner.adUnitId).toBe('a');
  });

  test('AdManagerBannerAd requires a size', () => {
    expect(() => new AdManagerBannerAd({
      adUnitId: 'test-ad-manager-banner',
      sizes: [],
      request: new AdManagerAdRequest(),
      listener: {},
    }, manager)).toThrow(PreconditionViolationError);
  });

  test('AdManagerBannerAd keeps its own copy of the sizes', () => {
    const sizes = [AdSize.banner];
    const banner = new AdManagerBannerAd({
      adUnitId: 'test-ad-manager-banner',
      sizes,
      request: new AdManagerAdRequest(),
      listener: {},
    }, manager);

    sizes.push(AdSize.leaderboard);

    expect(banner.sizes).toEqual([AdSize.banner]);
  });

  test('NativeAd takes one of both request kinds', () => {
    const withRequest = new NativeAd({
      adUnitId: 'test-native',
      factoryId: 'test-factory',
      listener: {},
      request: new AdRequest(),
    }, manager);
    const withAdManagerRequest = NativeAd.fromAdManagerRequest({
      adUnitId: 'test-native',
      factoryId: 'test-factory',
      listener: {},
      adManagerRequest: new AdManagerAdRequest(),
    }, manager);

    expect(withRequest.request).toEqual(new AdRequest());
    expect(withRequest.adManagerRequest).toBeNull();
    expect(withRequest.customOptions).toBeNull();
    expect(withAdManagerRequest.request).toBeNull();
    expect(withAdManagerRequest.adManagerRequest).toEqual(new AdManagerAdRequest());
  });

  test('RewardedAd from an ad manager request', async () => {
    const rewarded = RewardedAd.fromAdManagerRequest({
      adUnitId: 'test-rewarded',
      adManagerRequest: new AdManagerAdRequest(),
      rewardedAdLoadCallback: { onAdLoaded: jest.fn(), onAdFailedToLoad: jest.fn() },
    }, manager);

    await rewarded.load();

    expect(transport.log).toEqual([{
      method: BridgeMethod.LOAD_REWARDED_AD,
      args: {
        adId: 0,
        adUnitId: 'test-rewarded',
        request: null,
        adManagerRequest: new AdManagerAdRequest(),
        serverSideVerificationOptions: null,
      },
    }]);
  });

  test('RewardedAd.show keeps the reward callback', async () => {
    const rewarded = new RewardedAd({
      adUnitId: 'test-rewarded',
      request: new AdRequest(),
      serverSideVerificationOptions: new ServerSideVerificationOptions({ userId: 'test-user' }),
      rewardedAdLoadCallback: { onAdLoaded: jest.fn(), onAdFailedToLoad: jest.fn() },
    }, manager);
    const onUserEarnedReward = jest.fn();

    await rewarded.load();
    await rewarded.show({ onUserEarnedReward });

    expect(rewarded.onUserEarnedRewardCallback).toBe(onUserEarnedReward);
    expect(transport.log.map(call => call.method)).toEqual([
      BridgeMethod.LOAD_REWARDED_AD,
      BridgeMethod.SHOW_AD_WITHOUT_VIEW,
    ]);
  });

  test('Disposal is repeatable', async () => {
    const banner = new BannerAd({ adUnitId: 'a', size: AdSize.banner, request: new AdRequest(), listener: {} }, manager);

    await banner.load();
    await banner.dispose();
    await banner.dispose();

    expect(transport.log.map(call => call.method)).toEqual([
      BridgeMethod.LOAD_BANNER_AD,
      BridgeMethod.DISPOSE_AD,
    ]);
  });
});
