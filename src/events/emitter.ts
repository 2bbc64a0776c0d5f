import { TypedEventEmitter, toError } from "./typed-emitter";
import { SchedulerEventMap, StoreEventMap } from "../types/events";

export class SchedulerEmitter extends TypedEventEmitter<SchedulerEventMap> {
  emitSafe<K extends keyof SchedulerEventMap & string>(
    event: K,
    payload: SchedulerEventMap[K]
  ): void {
    try {
      this.emitUnsafe(event, payload);
    } catch (err) {
      // never allow listener failure to crash core
      try {
        this.emitUnsafe("scheduler:error", toError(err));
      } catch {
        // absolute last guard
      }
    }
  }
}

/**
 * Base for job stores. Listener failures surface as process warnings so a
 * broken subscriber cannot abort a bucket scan halfway.
 */
export class StoreEmitter extends TypedEventEmitter<StoreEventMap> {
  protected emitSafe<K extends keyof StoreEventMap & string>(
    event: K,
    payload: StoreEventMap[K]
  ): void {
    try {
      this.emitUnsafe(event, payload);
    } catch (err) {
      process.emitWarning(toError(err));
    }
  }
}
