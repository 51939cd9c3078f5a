import _ from "lodash";
import * as yup from "yup";
import {DeepPartial} from "ts-essentials";
import {logConfigSchema} from "../logger/config";
import {BridgeConfig} from "./types";

export {BridgeConfig} from "./types";

export const DEFAULT_CHANNEL = 'mobile_ads';

export const bridgeConfigSchema = yup.object({
  env: yup.string().required(),
  log: logConfigSchema.required(),
  transport: yup.object({
    url: yup.string().matches(/^(https?|wss?):\/\//, 'transport.url must be an http(s) or ws(s) url').required(),
    channel: yup.string().matches(/^[\w.\-/]+$/).required(),
    timeout: yup.number().positive().required(),
  }).required(),
  ads: yup.object({
    disposeOnLoadFailure: yup.boolean().required(),
  }).required(),
}).required();

export const DEFAULT_BRIDGE_CONFIG: DeepPartial<BridgeConfig> = {
  log: {
    level: 'info',
    transports: {
      json: {
        enabled: false,
      },
    }
  },
  transport: {
    channel: DEFAULT_CHANNEL,
    timeout: 5000,
  },
  ads: {
    disposeOnLoadFailure: false,
  },
};

export function validateBridgeConfig(data: string | object): BridgeConfig {
  const final: BridgeConfig = _.defaultsDeep(
    {},
    typeof data === 'string' ? JSON.parse(data) : data,
    DEFAULT_BRIDGE_CONFIG
  );
  bridgeConfigSchema.validateSync(final);

  return final;
}
