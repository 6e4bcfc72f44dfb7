// pattern: Imperative Shell
import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type Database from "better-sqlite3";

/**
 * Applies every `.sql` file in `folder` that has not been applied yet, in
 * filename order. Each file runs in its own transaction and is recorded in
 * `schema_migrations`.
 *
 * @returns Names of the files applied by this call.
 */
export function applyMigrations(
  sqlite: Database.Database,
  folder: string,
): ReadonlyArray<string> {
  sqlite.exec(
    "CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY NOT NULL, applied_at INTEGER NOT NULL)",
  );

  const applied = new Set(
    sqlite
      .prepare("SELECT name FROM schema_migrations")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === "string"),
  );

  const pending = readdirSync(folder)
    .filter((file) => file.endsWith(".sql") && !applied.has(file))
    .sort();

  const record = sqlite.prepare(
    "INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)",
  );

  for (const file of pending) {
    const statements = readFileSync(join(folder, file), "utf-8");
    sqlite.transaction(() => {
      sqlite.exec(statements);
      record.run(file, Date.now());
    })();
  }

  return pending;
}
