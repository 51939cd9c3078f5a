/**
 * Values forwarded to the server-to-server reward callback
 * of a rewarded ad.
 */
export class ServerSideVerificationOptions {
  readonly userId?: string;
  readonly customData?: string;

  constructor(options: { userId?: string; customData?: string } = {}) {
    this.userId = options.userId;
    this.customData = options.customData;
  }

  equals(other: unknown): boolean {
    return other instanceof ServerSideVerificationOptions &&
      this.userId === other.userId &&
      this.customData === other.customData;
  }
}
