import type { Container } from "inversify";

import { REALTIME_TYPES } from "./realtime.types";
import { RealtimeHub } from "./realtimeHub";
import { KeyedLock } from "./keyedLock";

export function registerRealtimeModule(container: Container) {
  container
	.bind<RealtimeHub>(REALTIME_TYPES.RealtimeHub)
	.to(RealtimeHub)
	.inSingletonScope();

  container
	.bind<KeyedLock>(REALTIME_TYPES.KeyedLock)
	.to(KeyedLock)
	.inSingletonScope();
}
