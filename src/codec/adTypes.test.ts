import {ProtocolViolationError} from "../errors";
import {
  AdError,
  AdManagerAdRequest,
  AdRequest,
  AdSize,
  LoadAdError,
  ResponseInfo,
  RewardItem,
  ServerSideVerificationOptions,
} from "../ads/values";
import {AdValueTag, adMessageCodec} from "./adTypes";

function roundTrip(value: unknown): unknown {
  return adMessageCodec.decode(adMessageCodec.encode(value));
}

describe('Codec :: Ad values', () => {
  test('AdSize', () => {
    expect(adMessageCodec.encode(AdSize.banner)).toEqual(Buffer.from([
      AdValueTag.AD_SIZE,
      3, 0x40, 0x01, 0x00, 0x00,
      3, 50, 0x00, 0x00, 0x00,
    ]));

    const decoded = roundTrip(AdSize.banner);
    expect(decoded).toBeInstanceOf(AdSize);
    expect(AdSize.banner.equals(decoded)).toBe(true);
    expect(AdSize.smartBannerLandscape.equals(roundTrip(AdSize.smartBannerLandscape))).toBe(true);
  });

  test('AdRequest', () => {
    const full = new AdRequest({
      keywords: ['1', '2', '3'],
      contentUrl: 'https://content.example.com',
      nonPersonalizedAds: false,
    });
    const empty = new AdRequest();

    expect(roundTrip(full)).toBeInstanceOf(AdRequest);
    expect(full.equals(roundTrip(full))).toBe(true);
    expect(empty.equals(roundTrip(empty))).toBe(true);
    expect(empty.equals(roundTrip(full))).toBe(false);
  });

  test('AdManagerAdRequest', () => {
    const full = new AdManagerAdRequest({
      keywords: ['who'],
      contentUrl: 'dat',
      customTargeting: { boy: 'who' },
      customTargetingLists: { him: ['is'] },
      nonPersonalizedAds: true,
    });
    const empty = new AdManagerAdRequest();

    expect(roundTrip(full)).toBeInstanceOf(AdManagerAdRequest);
    expect(full.equals(roundTrip(full))).toBe(true);
    expect(empty.equals(roundTrip(empty))).toBe(true);
    // same fields, different request kind
    expect(new AdRequest().equals(roundTrip(empty))).toBe(false);
  });

  test('AdManagerAdRequest targeting keeps a __proto__ key', () => {
    const customTargeting: Record<string, string> = JSON.parse('{"__proto__":"v","k":"w"}');
    const customTargetingLists: Record<string, string[]> = JSON.parse('{"__proto__":["v"]}');
    const request = new AdManagerAdRequest({ customTargeting, customTargetingLists });

    const decoded = roundTrip(request);

    if (!(decoded instanceof AdManagerAdRequest)) {
      throw new Error('expected an AdManagerAdRequest');
    }
    expect(request.equals(decoded)).toBe(true);
    expect(Object.keys(decoded.customTargeting ?? {})).toEqual(['__proto__', 'k']);
    expect(Object.keys(decoded.customTargetingLists ?? {})).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(decoded.customTargeting)).toBe(Object.prototype);
  });

  test('RewardItem', () => {
    const whole = new RewardItem(1, 'one');
    const fraction = new RewardItem(2.5, 'coins');

    expect(whole.equals(roundTrip(whole))).toBe(true);
    expect(fraction.equals(roundTrip(fraction))).toBe(true);
  });

  test('LoadAdError', () => {
    const withInfo = new LoadAdError(1, 'domain', 'message', new ResponseInfo({
      responseId: 'id',
      mediationAdapterClassName: 'className',
    }));
    const withoutInfo = new LoadAdError(1, 'd', 'm', null);
    const emptyInfo = new LoadAdError(1, 'd', 'm', new ResponseInfo());

    const decoded = roundTrip(withInfo);
    expect(decoded).toBeInstanceOf(LoadAdError);
    expect(withInfo.equals(decoded)).toBe(true);
    expect(withoutInfo.equals(roundTrip(withoutInfo))).toBe(true);
    expect(emptyInfo.equals(roundTrip(emptyInfo))).toBe(true);
    expect(withoutInfo.equals(roundTrip(emptyInfo))).toBe(false);
  });

  test('AdError stays distinct from LoadAdError', () => {
    const error = new AdError(4, 'show', 'already shown');

    expect(adMessageCodec.encode(error)[0]).toBe(AdValueTag.AD_ERROR);
    expect(adMessageCodec.encode(new LoadAdError(4, 'show', 'already shown', null))[0]).toBe(AdValueTag.LOAD_AD_ERROR);

    const decoded = roundTrip(error);
    expect(decoded).not.toBeInstanceOf(LoadAdError);
    expect(error.equals(decoded)).toBe(true);
  });

  test('ServerSideVerificationOptions', () => {
    const full = new ServerSideVerificationOptions({ userId: 'test-user-id', customData: 'test-custom-data' });
    const empty = new ServerSideVerificationOptions();
    const partial = new ServerSideVerificationOptions({ customData: 'only-data' });

    expect(full.equals(roundTrip(full))).toBe(true);
    expect(empty.equals(roundTrip(empty))).toBe(true);
    expect(partial.equals(roundTrip(partial))).toBe(true);
  });

  test('Values nested in a message map', () => {
    const message = {
      adId: 0,
      eventName: 'onRewardedAdUserEarnedReward',
      rewardItem: new RewardItem(1, 'one'),
    };

    const decoded = roundTrip(message);
    expect(decoded).toEqual(message);
  });

  test('Rejects fields of the wrong type', () => {
    const sizeWithStringWidth = Buffer.from([AdValueTag.AD_SIZE, 7, 1, 0x61, 3, 0, 0, 0, 0]);

    expect(() => adMessageCodec.decode(sizeWithStringWidth)).toThrow(ProtocolViolationError);
    expect(() => adMessageCodec.decode(sizeWithStringWidth)).toThrow('Field width should be a number, got string');
  });
});
