import _ from "lodash";

export enum MaxAdContentRating {
  G = 'G',
  PG = 'PG',
  T = 'T',
  MA = 'MA',
}

export enum TagForChildDirectedTreatment {
  UNSPECIFIED = -1,
  NO = 0,
  YES = 1,
}

export enum TagForUnderAgeOfConsent {
  UNSPECIFIED = -1,
  NO = 0,
  YES = 1,
}

export interface RequestConfigurationOptions {
  readonly maxAdContentRating?: MaxAdContentRating;
  readonly tagForChildDirectedTreatment?: TagForChildDirectedTreatment;
  readonly tagForUnderAgeOfConsent?: TagForUnderAgeOfConsent;
  readonly testDeviceIds?: readonly string[];
}

/**
 * Global settings applied by the sdk to every following ad request.
 */
export class RequestConfiguration {
  readonly maxAdContentRating?: MaxAdContentRating;
  readonly tagForChildDirectedTreatment?: TagForChildDirectedTreatment;
  readonly tagForUnderAgeOfConsent?: TagForUnderAgeOfConsent;
  readonly testDeviceIds?: readonly string[];

  constructor(options: RequestConfigurationOptions = {}) {
    this.maxAdContentRating = options.maxAdContentRating;
    this.tagForChildDirectedTreatment = options.tagForChildDirectedTreatment;
    this.tagForUnderAgeOfConsent = options.tagForUnderAgeOfConsent;
    this.testDeviceIds = options.testDeviceIds && [...options.testDeviceIds];
  }

  toArguments(): Record<string, unknown> {
    return {
      maxAdContentRating: this.maxAdContentRating ?? null,
      tagForChildDirectedTreatment: this.tagForChildDirectedTreatment ?? null,
      tagForUnderAgeOfConsent: this.tagForUnderAgeOfConsent ?? null,
      testDeviceIds: this.testDeviceIds ?? null,
    };
  }

  equals(other: unknown): boolean {
    return other instanceof RequestConfiguration &&
      this.maxAdContentRating === other.maxAdContentRating &&
      this.tagForChildDirectedTreatment === other.tagForChildDirectedTreatment &&
      this.tagForUnderAgeOfConsent === other.tagForUnderAgeOfConsent &&
      _.isEqual(this.testDeviceIds, other.testDeviceIds);
  }
}
