export { SchedulerEmitter, StoreEmitter } from "./emitter";
export { TypedEventEmitter, toError } from "./typed-emitter";
