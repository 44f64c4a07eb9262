import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { getEnv } from "./config/rawEnv.js";
import { log } from "./utils/logger.js";

const dbLog = log.withScope("db");

const dbByPath = new Map<string, Database.Database>();
let schemaSqlCache: string | null = null;

function assertTestDbPathSafety(dbPath: string): void {
  if (getEnv("NODE_ENV") !== "test") return;

  const resolvedDbPath = path.resolve(dbPath);
  const resolvedTmpRoot = path.resolve(os.tmpdir());
  const normalize = (value: string) => path.normalize(value).toLowerCase();

  if (!normalize(resolvedDbPath).startsWith(normalize(resolvedTmpRoot + path.sep))) {
    throw new Error(
      `[db-test-safety] Refusing non-temp DB path in test mode: ${resolvedDbPath}. Expected under ${resolvedTmpRoot}`,
    );
  }
}

function ensureDirFor(dbPath: string) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function getSchemaSql(): string {
  if (schemaSqlCache) return schemaSqlCache;
  const schemaPath = path.join(process.cwd(), "src", "db", "schema.sql");
  schemaSqlCache = fs.readFileSync(schemaPath, "utf8");
  return schemaSqlCache;
}

function bootstrapDbAtPath(dbPath: string): Database.Database {
  assertTestDbPathSafety(dbPath);
  ensureDirFor(dbPath);
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(getSchemaSql());
  return db;
}

/**
 * Open (or reuse) the stats database at dbPath.
 * Connections are cached per resolved path for the lifetime of the process.
 */
export function getStatsDb(dbPath: string): Database.Database {
  const resolved = path.resolve(dbPath);
  const existing = dbByPath.get(resolved);
  if (existing) {
    dbLog.trace("db-route", { dbPath: resolved, status: "cache-hit" });
    return existing;
  }

  const db = bootstrapDbAtPath(resolved);
  dbByPath.set(resolved, db);
  dbLog.debug("db-route", { dbPath: resolved, status: "opened-new" });
  return db;
}

export function closeAllStatsDbs(): void {
  for (const [dbPath, db] of dbByPath) {
    db.close();
    dbByPath.delete(dbPath);
  }
}
