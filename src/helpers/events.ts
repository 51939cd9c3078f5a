import {EventEmitter} from "events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Listener = (...args: any[]) => void;

export type EventsDefinition<Type extends string> = Record<Type, Listener>;

type EventsMap<Events> = { [E in keyof Events]: Listener };
type EventName<Events> = Extract<keyof Events, string>;

export interface TypedEmitter<Events extends EventsMap<Events>> {
  on<E extends EventName<Events>>(event: E, listener: Events[E]): this;
  once<E extends EventName<Events>>(event: E, listener: Events[E]): this;
  off<E extends EventName<Events>>(event: E, listener: Events[E]): this;
  removeAllListeners<E extends EventName<Events>>(event?: E): this;

  emit<E extends EventName<Events>>(event: E, ...args: Parameters<Events[E]>): boolean;
  listenerCount<E extends EventName<Events>>(event: E): number;
}

/**
 * EventEmitter wrapper that checks event names and listener
 * signatures against an events definition.
 */
export class TypedEventEmitter<Events extends EventsMap<Events>> implements TypedEmitter<Events> {
  private readonly emitter = new EventEmitter();

  on<E extends EventName<Events>>(event: E, listener: Events[E]): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends EventName<Events>>(event: E, listener: Events[E]): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends EventName<Events>>(event: E, listener: Events[E]): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<E extends EventName<Events>>(event?: E): this {
    if (event === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(event);
    }
    return this;
  }

  emit<E extends EventName<Events>>(event: E, ...args: Parameters<Events[E]>): boolean {
    return this.emitter.emit(event, ...args);
  }

  listenerCount<E extends EventName<Events>>(event: E): number {
    return this.emitter.listenerCount(event);
  }
}
