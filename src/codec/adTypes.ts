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
import {CodecTypeDefinition, MessageCodec} from "./MessageCodec";
import {
  readNumber,
  readOptionalBoolean,
  readOptionalInstance,
  readOptionalString,
  readOptionalStringList,
  readOptionalStringListMap,
  readOptionalStringMap,
  readString,
} from "./fields";

export enum AdValueTag {
  AD_SIZE = 128,
  AD_REQUEST = 129,
  REWARD_ITEM = 130,
  LOAD_AD_ERROR = 131,
  AD_MANAGER_AD_REQUEST = 132,
  RESPONSE_INFO = 133,
  SERVER_SIDE_VERIFICATION_OPTIONS = 134,
  AD_ERROR = 135,
}

const adSizeType: CodecTypeDefinition<AdSize> = {
  tag: AdValueTag.AD_SIZE,
  name: 'AdSize',
  matches: (value): value is AdSize => value instanceof AdSize,
  write(codec, buffer, size) {
    codec.writeValue(buffer, size.width);
    codec.writeValue(buffer, size.height);
  },
  read(codec, buffer) {
    return new AdSize({
      width: readNumber(codec, buffer, 'width'),
      height: readNumber(codec, buffer, 'height'),
    });
  },
};

const adRequestType: CodecTypeDefinition<AdRequest> = {
  tag: AdValueTag.AD_REQUEST,
  name: 'AdRequest',
  matches: (value): value is AdRequest => value instanceof AdRequest,
  write(codec, buffer, request) {
    codec.writeValue(buffer, request.keywords);
    codec.writeValue(buffer, request.contentUrl);
    codec.writeValue(buffer, request.nonPersonalizedAds);
  },
  read(codec, buffer) {
    return new AdRequest({
      keywords: readOptionalStringList(codec, buffer, 'keywords'),
      contentUrl: readOptionalString(codec, buffer, 'contentUrl'),
      nonPersonalizedAds: readOptionalBoolean(codec, buffer, 'nonPersonalizedAds'),
    });
  },
};

const adManagerAdRequestType: CodecTypeDefinition<AdManagerAdRequest> = {
  tag: AdValueTag.AD_MANAGER_AD_REQUEST,
  name: 'AdManagerAdRequest',
  matches: (value): value is AdManagerAdRequest => value instanceof AdManagerAdRequest,
  write(codec, buffer, request) {
    codec.writeValue(buffer, request.keywords);
    codec.writeValue(buffer, request.contentUrl);
    codec.writeValue(buffer, request.customTargeting);
    codec.writeValue(buffer, request.customTargetingLists);
    codec.writeValue(buffer, request.nonPersonalizedAds);
  },
  read(codec, buffer) {
    return new AdManagerAdRequest({
      keywords: readOptionalStringList(codec, buffer, 'keywords'),
      contentUrl: readOptionalString(codec, buffer, 'contentUrl'),
      customTargeting: readOptionalStringMap(codec, buffer, 'customTargeting'),
      customTargetingLists: readOptionalStringListMap(codec, buffer, 'customTargetingLists'),
      nonPersonalizedAds: readOptionalBoolean(codec, buffer, 'nonPersonalizedAds'),
    });
  },
};

const rewardItemType: CodecTypeDefinition<RewardItem> = {
  tag: AdValueTag.REWARD_ITEM,
  name: 'RewardItem',
  matches: (value): value is RewardItem => value instanceof RewardItem,
  write(codec, buffer, item) {
    codec.writeValue(buffer, item.amount);
    codec.writeValue(buffer, item.type);
  },
  read(codec, buffer) {
    return new RewardItem(
      readNumber(codec, buffer, 'amount'),
      readString(codec, buffer, 'type'),
    );
  },
};

const responseInfoType: CodecTypeDefinition<ResponseInfo> = {
  tag: AdValueTag.RESPONSE_INFO,
  name: 'ResponseInfo',
  matches: (value): value is ResponseInfo => value instanceof ResponseInfo,
  write(codec, buffer, info) {
    codec.writeValue(buffer, info.responseId);
    codec.writeValue(buffer, info.mediationAdapterClassName);
  },
  read(codec, buffer) {
    return new ResponseInfo({
      responseId: readOptionalString(codec, buffer, 'responseId'),
      mediationAdapterClassName: readOptionalString(codec, buffer, 'mediationAdapterClassName'),
    });
  },
};

// must come before adErrorType, a LoadAdError is also an AdError
const loadAdErrorType: CodecTypeDefinition<LoadAdError> = {
  tag: AdValueTag.LOAD_AD_ERROR,
  name: 'LoadAdError',
  matches: (value): value is LoadAdError => value instanceof LoadAdError,
  write(codec, buffer, error) {
    codec.writeValue(buffer, error.code);
    codec.writeValue(buffer, error.domain);
    codec.writeValue(buffer, error.message);
    codec.writeValue(buffer, error.responseInfo);
  },
  read(codec, buffer) {
    return new LoadAdError(
      readNumber(codec, buffer, 'code'),
      readString(codec, buffer, 'domain'),
      readString(codec, buffer, 'message'),
      readOptionalInstance(codec, buffer, 'responseInfo', ResponseInfo),
    );
  },
};

const adErrorType: CodecTypeDefinition<AdError> = {
  tag: AdValueTag.AD_ERROR,
  name: 'AdError',
  matches: (value): value is AdError => value instanceof AdError,
  write(codec, buffer, error) {
    codec.writeValue(buffer, error.code);
    codec.writeValue(buffer, error.domain);
    codec.writeValue(buffer, error.message);
  },
  read(codec, buffer) {
    return new AdError(
      readNumber(codec, buffer, 'code'),
      readString(codec, buffer, 'domain'),
      readString(codec, buffer, 'message'),
    );
  },
};

const serverSideVerificationOptionsType: CodecTypeDefinition<ServerSideVerificationOptions> = {
  tag: AdValueTag.SERVER_SIDE_VERIFICATION_OPTIONS,
  name: 'ServerSideVerificationOptions',
  matches: (value): value is ServerSideVerificationOptions => value instanceof ServerSideVerificationOptions,
  write(codec, buffer, options) {
    codec.writeValue(buffer, options.userId);
    codec.writeValue(buffer, options.customData);
  },
  read(codec, buffer) {
    return new ServerSideVerificationOptions({
      userId: readOptionalString(codec, buffer, 'userId'),
      customData: readOptionalString(codec, buffer, 'customData'),
    });
  },
};

export const AD_VALUE_TYPES: ReadonlyArray<CodecTypeDefinition<unknown>> = [
  adSizeType,
  adRequestType,
  adManagerAdRequestType,
  rewardItemType,
  responseInfoType,
  loadAdErrorType,
  adErrorType,
  serverSideVerificationOptionsType,
];

/**
 * Codec for the bridge channel. Extra definitions are appended after
 * the ad value types and must use unused tags.
 */
export function createAdMessageCodec(extraTypes: ReadonlyArray<CodecTypeDefinition<unknown>> = []): MessageCodec {
  return new MessageCodec([...AD_VALUE_TYPES, ...extraTypes]);
}

export const adMessageCodec = createAdMessageCodec();
