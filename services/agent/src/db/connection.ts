import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { FastifyBaseLogger } from "fastify";
import Database from "better-sqlite3";
import { DEFAULT_STATE_PATH } from "@satchel/schemas";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Opens (creating if needed) the agent's state database. The file holds
 * secret material, so it is readable by the owner only.
 */
export function openStateDatabase(dbPath: string = DEFAULT_STATE_PATH, logger?: FastifyBaseLogger): Database.Database {
  const resolvedPath = path.resolve(dbPath);
  ensureDir(path.dirname(resolvedPath), logger);
  logger?.info({ dbPath: resolvedPath }, "agent: opening state database");

  let db: Database.Database;
  try {
    db = new Database(resolvedPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`agent: failed to open SQLite at ${resolvedPath}: ${message}`);
  }

  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = FULL");
    db.pragma("foreign_keys = ON");
    const schema = fs.readFileSync(path.resolve(__dirname, "schema.sql"), "utf-8");
    db.exec(schema);
    fs.chmodSync(resolvedPath, 0o600);
  } catch (error) {
    db.close();
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`agent: SQLite not writable at ${resolvedPath}: ${message}`);
  }

  return db;
}

function ensureDir(dir: string, logger?: FastifyBaseLogger): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    logger?.info({ dir }, "agent: created state directory");
  }
}
