/**
 * Credit earned by the user from a rewarded ad.
 */
export class RewardItem {
  constructor(
    public readonly amount: number,
    public readonly type: string,
  ) {
  }

  equals(other: unknown): boolean {
    return other instanceof RewardItem &&
      this.amount === other.amount &&
      this.type === other.type;
  }
}
