import {AdInstanceManager} from "../registry/AdInstanceManager";
import {Ad} from "./Ad";
import {AdLoadListener, AdViewListener, NativeClickListener} from "./listeners";
import {AdKind} from "./types";
import {AdManagerAdRequest, AdRequest} from "./values";

export type NativeAdListener =
  & AdLoadListener<NativeAd>
  & AdViewListener<NativeAd>
  & NativeClickListener<NativeAd>;

interface NativeAdBaseOptions {
  readonly adUnitId: string;
  // names the view factory registered on the host side
  readonly factoryId: string;
  readonly listener: NativeAdListener;
  // handed to the view factory as is
  readonly customOptions?: Readonly<Record<string, unknown>>;
}

export type NativeAdOptions =
  | NativeAdBaseOptions & { readonly request: AdRequest }
  | NativeAdBaseOptions & { readonly adManagerRequest: AdManagerAdRequest };

/**
 * Ad whose view is built by a host registered factory from the
 * native ad assets.
 */
export class NativeAd extends Ad {
  readonly kind: AdKind.NATIVE = AdKind.NATIVE;

  readonly factoryId: string;
  readonly listener: NativeAdListener;
  readonly customOptions: Readonly<Record<string, unknown>> | null;
  readonly request: AdRequest | null;
  readonly adManagerRequest: AdManagerAdRequest | null;

  constructor(options: NativeAdOptions, manager: AdInstanceManager) {
    super(options.adUnitId, manager);

    this.factoryId = options.factoryId;
    this.listener = options.listener;
    this.customOptions = options.customOptions ?? null;

    if ('request' in options) {
      this.request = options.request;
      this.adManagerRequest = null;
    } else {
      this.request = null;
      this.adManagerRequest = options.adManagerRequest;
    }
  }

  static fromAdManagerRequest(
    options: NativeAdBaseOptions & { readonly adManagerRequest: AdManagerAdRequest },
    manager: AdInstanceManager,
  ): NativeAd {
    return new NativeAd(options, manager);
  }

  load(): Promise<void> {
    return this.manager.loadNativeAd(this);
  }
}
