import _ from "lodash";
import {AdError, LoadAdError, RewardItem} from "../ads/values";
import {ProtocolViolationError} from "../errors";
import {isRecord} from "../helpers/types";
import {AdId} from "../types";

export enum AdEventName {
  AD_LOADED = 'onAdLoaded',
  AD_FAILED_TO_LOAD = 'onAdFailedToLoad',
  AD_OPENED = 'onAdOpened',
  AD_WILL_DISMISS_SCREEN = 'onAdWillDismissScreen',
  AD_CLOSED = 'onAdClosed',
  AD_IMPRESSION = 'onAdImpression',
  NATIVE_AD_CLICKED = 'onNativeAdClicked',
  APP_EVENT = 'onAppEvent',
  AD_SHOWED_FULL_SCREEN_CONTENT = 'onAdShowedFullScreenContent',
  AD_FAILED_TO_SHOW_FULL_SCREEN_CONTENT = 'onAdFailedToShowFullScreenContent',
  AD_WILL_DISMISS_FULL_SCREEN_CONTENT = 'onAdWillDismissFullScreenContent',
  AD_DISMISSED_FULL_SCREEN_CONTENT = 'onAdDismissedFullScreenContent',
  REWARDED_AD_USER_EARNED_REWARD = 'onRewardedAdUserEarnedReward',
}

const AD_EVENT_NAMES: readonly string[] = Object.values(AdEventName);

function isAdEventName(value: unknown): value is AdEventName {
  return typeof value === 'string' && AD_EVENT_NAMES.includes(value);
}

export interface AdEvent {
  readonly adId: AdId;
  readonly eventName: AdEventName;
  // every other key of the message
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Validates a decoded onAdEvent message.
 */
export function parseAdEvent(message: unknown): AdEvent {
  if (!isRecord(message)) {
    throw new ProtocolViolationError('Ad event message should be a map', { type: typeof message });
  }

  const {adId, eventName, ...payload} = message;

  if (typeof adId !== 'number' || !Number.isInteger(adId)) {
    throw new ProtocolViolationError('Ad event without integer adId', { adId });
  }

  if (typeof eventName !== 'string') {
    throw new ProtocolViolationError('Ad event without eventName', { adId });
  }

  if (!isAdEventName(eventName)) {
    throw new ProtocolViolationError(`Unknown ad event ${eventName}`, { adId, eventName });
  }

  return { adId, eventName, payload };
}

function payloadValue<T>(event: AdEvent, key: string, type: new (...args: never[]) => T): T {
  const value = event.payload[key];

  if (!(value instanceof type)) {
    throw new ProtocolViolationError(`${event.eventName} should carry a ${type.name} as ${key}`, {
      adId: event.adId,
      got: _.get(value, 'constructor.name', typeof value),
    });
  }

  return value;
}

function payloadString(event: AdEvent, key: string): string {
  const value = event.payload[key];

  if (typeof value !== 'string') {
    throw new ProtocolViolationError(`${event.eventName} should carry a string as ${key}`, {
      adId: event.adId,
    });
  }

  return value;
}

export const loadAdErrorOf = (event: AdEvent): LoadAdError => payloadValue(event, 'loadAdError', LoadAdError);

export const adErrorOf = (event: AdEvent): AdError => payloadValue(event, 'error', AdError);

export const rewardItemOf = (event: AdEvent): RewardItem => payloadValue(event, 'rewardItem', RewardItem);

export const appEventOf = (event: AdEvent): { name: string; data: string } => ({
  name: payloadString(event, 'name'),
  data: payloadString(event, 'data'),
});
