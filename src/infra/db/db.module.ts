import type { Container } from "inversify";

import { DB_TYPES } from "./db.types";
import { getDb, type Database } from "./client";

export function registerDbModule(container: Container) {
  container
	.bind<Database>(DB_TYPES.Database)
	.toDynamicValue(() => getDb())
	.inSingletonScope();
}
