import {AdInstanceManager} from "../registry/AdInstanceManager";
import {AdKind} from "./types";

/**
 * Client side handle of one ad. The registry assigns it an id on load,
 * every event of the bridge for that id is routed to this object.
 */
export abstract class Ad {
  abstract readonly kind: AdKind;

  protected constructor(
    // identifies the ad placement at the remote sdk
    readonly adUnitId: string,
    protected readonly manager: AdInstanceManager,
  ) {
  }

  /**
   * Sends the load request. Resolves once the bridge accepted it,
   * the outcome arrives later through the listener.
   */
  abstract load(): Promise<void>;

  /**
   * Frees the ad on both sides. Safe to call repeatedly, the ad can be
   * loaded again afterwards and gets a new id.
   */
  dispose(): Promise<void> {
    return this.manager.disposeAd(this);
  }

  async isLoaded(): Promise<boolean> {
    return this.manager.onAdLoadedCalled(this);
  }
}
