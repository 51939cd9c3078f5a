import _ from "lodash";

export interface AdRequestOptions {
  // words or phrases describing the current user activity
  readonly keywords?: readonly string[];
  // url of a page whose content matches the app content
  readonly contentUrl?: string;
  readonly nonPersonalizedAds?: boolean;
}

/**
 * Targeting info sent along an ad load.
 */
export class AdRequest {
  readonly keywords?: readonly string[];
  readonly contentUrl?: string;
  readonly nonPersonalizedAds?: boolean;

  constructor(options: AdRequestOptions = {}) {
    this.keywords = options.keywords && [...options.keywords];
    this.contentUrl = options.contentUrl;
    this.nonPersonalizedAds = options.nonPersonalizedAds;
  }

  equals(other: unknown): boolean {
    return other instanceof AdRequest &&
      _.isEqual(this.keywords, other.keywords) &&
      this.contentUrl === other.contentUrl &&
      this.nonPersonalizedAds === other.nonPersonalizedAds;
  }
}

export interface AdManagerAdRequestOptions extends AdRequestOptions {
  readonly customTargeting?: Readonly<Record<string, string>>;
  readonly customTargetingLists?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Targeting info for ad manager loads, adds custom key/value targeting.
 */
export class AdManagerAdRequest {
  readonly keywords?: readonly string[];
  readonly contentUrl?: string;
  readonly customTargeting?: Readonly<Record<string, string>>;
  readonly customTargetingLists?: Readonly<Record<string, readonly string[]>>;
  readonly nonPersonalizedAds?: boolean;

  constructor(options: AdManagerAdRequestOptions = {}) {
    this.keywords = options.keywords && [...options.keywords];
    this.contentUrl = options.contentUrl;
    this.customTargeting = options.customTargeting && { ...options.customTargeting };
    this.customTargetingLists = options.customTargetingLists && _.mapValues(options.customTargetingLists, values => [...values]);
    this.nonPersonalizedAds = options.nonPersonalizedAds;
  }

  equals(other: unknown): boolean {
    return other instanceof AdManagerAdRequest &&
      _.isEqual(this.keywords, other.keywords) &&
      this.contentUrl === other.contentUrl &&
      _.isEqual(this.customTargeting, other.customTargeting) &&
      _.isEqual(this.customTargetingLists, other.customTargetingLists) &&
      this.nonPersonalizedAds === other.nonPersonalizedAds;
  }
}
