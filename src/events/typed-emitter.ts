import { EventEmitter } from "events";

export type EventMap = Record<string, unknown>;

export class TypedEventEmitter<T extends EventMap> {
  private emitter = new EventEmitter();

  on<K extends keyof T & string>(
    event: K,
    listener: (payload: T[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof T & string>(
    event: K,
    listener: (payload: T[K]) => void
  ): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof T & string>(
    event: K,
    listener: (payload: T[K]) => void
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  listenerCount<K extends keyof T & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emitUnsafe<K extends keyof T & string>(
    event: K,
    payload: T[K]
  ): void {
    this.emitter.emit(event, payload);
  }
}

export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return new Error(err.message);
  }
  return new Error(String(err));
}
