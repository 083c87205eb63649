export const REALTIME_TYPES = {
  RealtimeHub: Symbol.for("RealtimeHub"),
  KeyedLock: Symbol.for("KeyedLock"),
} as const;
