import {PreconditionViolationError} from "../../errors";
import {AdError, LoadAdError, ResponseInfo} from "./AdError";
import {AdManagerAdRequest, AdRequest} from "./AdRequest";
import {AdSize} from "./AdSize";
import {MaxAdContentRating, RequestConfiguration, TagForUnderAgeOfConsent} from "./RequestConfiguration";
import {RewardItem} from "./RewardItem";
import {ServerSideVerificationOptions} from "./ServerSideVerificationOptions";

describe('Ads :: Values', () => {
  test('AdSize presets', () => {
    expect(AdSize.mediumRectangle.equals(new AdSize({ width: 300, height: 250 }))).toBe(true);
    expect(AdSize.banner.equals(AdSize.largeBanner)).toBe(false);
    expect(AdSize.banner.equals({ width: 320, height: 50 })).toBe(false);
  });

  test('Smart banner depends on platform and orientation', () => {
    expect(AdSize.getSmartBanner('android', 'landscape')).toBe(AdSize.smartBanner);
    expect(AdSize.getSmartBanner('ios', 'portrait')).toBe(AdSize.smartBannerPortrait);
    expect(AdSize.getSmartBanner('ios', 'landscape')).toBe(AdSize.smartBannerLandscape);
    expect(() => AdSize.getSmartBanner('web', 'portrait')).toThrow(PreconditionViolationError);
  });

  test('Requests compare by content', () => {
    expect(new AdRequest({ keywords: ['a', 'b'] }).equals(new AdRequest({ keywords: ['a', 'b'] }))).toBe(true);
    expect(new AdRequest({ keywords: ['a', 'b'] }).equals(new AdRequest({ keywords: ['b', 'a'] }))).toBe(false);
    expect(new AdRequest().equals(new AdRequest({ nonPersonalizedAds: false }))).toBe(false);

    expect(new AdManagerAdRequest({ customTargetingLists: { k: ['v'] } })
      .equals(new AdManagerAdRequest({ customTargetingLists: { k: ['v'] } }))).toBe(true);
    expect(new AdManagerAdRequest({ customTargeting: { k: 'v' } })
      .equals(new AdManagerAdRequest({ customTargeting: { k: 'w' } }))).toBe(false);
  });

  test('Requests copy their lists', () => {
    const keywords = ['a'];
    const request = new AdRequest({ keywords });

    keywords.push('b');

    expect(request.keywords).toEqual(['a']);
  });

  test('Errors compare by class and fields', () => {
    const info = new ResponseInfo({ responseId: 'test-response' });

    expect(new AdError(1, 'd', 'm').equals(new AdError(1, 'd', 'm'))).toBe(true);
    expect(new AdError(1, 'd', 'm').equals(new LoadAdError(1, 'd', 'm', null))).toBe(false);
    expect(new LoadAdError(1, 'd', 'm', null).equals(new AdError(1, 'd', 'm'))).toBe(false);
    expect(new LoadAdError(1, 'd', 'm', info).equals(new LoadAdError(1, 'd', 'm', new ResponseInfo({ responseId: 'test-response' })))).toBe(true);
    expect(new LoadAdError(1, 'd', 'm', info).equals(new LoadAdError(1, 'd', 'm', null))).toBe(false);
  });

  test('Errors print their fields', () => {
    expect(new AdError(1, 'd', 'm').toString()).toBe('AdError(code: 1, domain: d, message: m)');
    expect(new LoadAdError(1, 'd', 'm', null).toString())
      .toBe('LoadAdError(code: 1, domain: d, message: m, responseInfo: null)');
  });

  test('Reward and verification options', () => {
    expect(new RewardItem(10, 'coins').equals(new RewardItem(10, 'coins'))).toBe(true);
    expect(new RewardItem(10, 'coins').equals(new RewardItem(10, 'gems'))).toBe(false);
    expect(new ServerSideVerificationOptions({ userId: 'u' }).equals(new ServerSideVerificationOptions({ userId: 'u' }))).toBe(true);
    expect(new ServerSideVerificationOptions().equals(new ServerSideVerificationOptions({ customData: 'c' }))).toBe(false);
  });

  test('RequestConfiguration arguments', () => {
    const configuration = new RequestConfiguration({
      maxAdContentRating: MaxAdContentRating.MA,
      tagForUnderAgeOfConsent: TagForUnderAgeOfConsent.NO,
    });

    expect(configuration.toArguments()).toEqual({
      maxAdContentRating: 'MA',
      tagForChildDirectedTreatment: null,
      tagForUnderAgeOfConsent: 0,
      testDeviceIds: null,
    });
    expect(configuration.equals(new RequestConfiguration({
      maxAdContentRating: MaxAdContentRating.MA,
      tagForUnderAgeOfConsent: TagForUnderAgeOfConsent.NO,
    }))).toBe(true);
    expect(configuration.equals(new RequestConfiguration())).toBe(false);
  });
});
