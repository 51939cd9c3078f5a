export {CodecTypeDefinition, FIRST_CUSTOM_TAG, MessageCodec, ValueTag} from "./MessageCodec";
export {AD_VALUE_TYPES, AdValueTag, adMessageCodec, createAdMessageCodec} from "./adTypes";
export {ReadBuffer} from "./ReadBuffer";
export {WriteBuffer} from "./WriteBuffer";
