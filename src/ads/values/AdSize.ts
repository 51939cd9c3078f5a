import {PreconditionViolationError} from "../../errors";

export type Orientation = 'portrait' | 'landscape';

/**
 * Size of a banner ad. Negative dimensions are sentinel values
 * understood by the sdk for smart banners.
 */
export class AdSize {
  readonly width: number;
  readonly height: number;

  constructor(size: { width: number; height: number }) {
    this.width = size.width;
    this.height = size.height;
  }

  static readonly banner = new AdSize({ width: 320, height: 50 });
  static readonly largeBanner = new AdSize({ width: 320, height: 100 });
  static readonly mediumRectangle = new AdSize({ width: 300, height: 250 });
  static readonly fullBanner = new AdSize({ width: 468, height: 60 });
  static readonly leaderboard = new AdSize({ width: 728, height: 90 });

  // android: screen width banner in any orientation
  static readonly smartBanner = new AdSize({ width: -1, height: -1 });
  static readonly smartBannerPortrait = new AdSize({ width: -1, height: -2 });
  static readonly smartBannerLandscape = new AdSize({ width: -1, height: -3 });

  static getSmartBanner(platform: string, orientation: Orientation): AdSize {
    if (platform === 'android') {
      return AdSize.smartBanner;
    }

    if (platform === 'ios') {
      return orientation === 'portrait' ? AdSize.smartBannerPortrait : AdSize.smartBannerLandscape;
    }

    throw new PreconditionViolationError(`Smart banners are only supported on android and ios, got ${platform}`);
  }

  equals(other: unknown): boolean {
    return other instanceof AdSize &&
      this.width === other.width &&
      this.height === other.height;
  }

  toString(): string {
    return `AdSize(${this.width}x${this.height})`;
  }
}
