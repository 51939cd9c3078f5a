export type IfEnabled<T> =
  | { enabled: false } & Partial<T>
  | { enabled: true } & T;

/** Registry assigned id, the join key between an ad and the bridge. */
export type AdId = number;
