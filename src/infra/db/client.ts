import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";

import { loadEnv } from "@/config/env";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Database | null = null;

export function getDb(): Database {
	if (!db) {
		const env = loadEnv();

		pool = new pg.Pool({ connectionString: env.DATABASE_URL });
		db = drizzle(pool, { schema });
	}

	return db;
}

export async function closeDb(): Promise<void> {
	if (!pool) return;
	const p = pool;
	pool = null;
	db = null;
	await p.end();
}
