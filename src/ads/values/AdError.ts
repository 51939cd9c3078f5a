/**
 * Error information about why an ad operation failed, as reported
 * by the remote ads SDK.
 */
export class AdError {
  constructor(
    // sdk defined error code
    public readonly code: number,
    // the domain from which the error came
    public readonly domain: string,
    public readonly message: string,
  ) {
  }

  equals(other: unknown): boolean {
    return other instanceof AdError &&
      other.constructor === this.constructor &&
      this.code === other.code &&
      this.domain === other.domain &&
      this.message === other.message;
  }

  toString(): string {
    return `${this.constructor.name}(code: ${this.code}, domain: ${this.domain}, message: ${this.message})`;
  }
}

export interface ResponseInfoOptions {
  readonly responseId?: string;
  readonly mediationAdapterClassName?: string;
}

/**
 * Debugging information about the loaded ad or ad request.
 */
export class ResponseInfo {
  readonly responseId?: string;
  readonly mediationAdapterClassName?: string;

  constructor(options: ResponseInfoOptions = {}) {
    this.responseId = options.responseId;
    this.mediationAdapterClassName = options.mediationAdapterClassName;
  }

  equals(other: unknown): boolean {
    return other instanceof ResponseInfo &&
      this.responseId === other.responseId &&
      this.mediationAdapterClassName === other.mediationAdapterClassName;
  }

  toString(): string {
    return `ResponseInfo(responseId: ${this.responseId}, mediationAdapterClassName: ${this.mediationAdapterClassName})`;
  }
}

/**
 * Reason why an ad failed to load.
 */
export class LoadAdError extends AdError {
  constructor(
    code: number,
    domain: string,
    message: string,
    public readonly responseInfo: ResponseInfo | null,
  ) {
    super(code, domain, message);
  }

  equals(other: unknown): boolean {
    if (!super.equals(other) || !(other instanceof LoadAdError)) {
      return false;
    }

    if (this.responseInfo === null || other.responseInfo === null) {
      return this.responseInfo === other.responseInfo;
    }

    return this.responseInfo.equals(other.responseInfo);
  }

  toString(): string {
    return `LoadAdError(code: ${this.code}, domain: ${this.domain}, message: ${this.message}, responseInfo: ${this.responseInfo})`;
  }
}
