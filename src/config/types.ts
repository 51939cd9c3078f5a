import {DeepReadonly} from "ts-essentials";
import {LoggerConfig} from "../logger/config";
import {Milliseconds} from "../types/util";

export interface BaseAppConfig {
  readonly env: string;
  readonly log: LoggerConfig;
}

export type BridgeConfig = BaseAppConfig & DeepReadonly<{
  transport: {
    // base url of the bridge server, the channel is appended as namespace
    url: string;
    channel: string;
    timeout: Milliseconds;
  };
  ads: {
    // evict ads whose load failed right after onAdFailedToLoad ran
    disposeOnLoadFailure: boolean;
  };
}>;
