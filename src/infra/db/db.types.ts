export const DB_TYPES = {
  Database: Symbol.for("Database"),
} as const;
