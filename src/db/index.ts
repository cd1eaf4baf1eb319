// 日志库：管理 SQLite 连接、logs 表初始化与读写

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getDbPath } from "../config/paths.js";
import type { LogEntry, LogLevel } from "../logger/types.js";


let _db: Database.Database | null = null;


/** 获取（或初始化）全局数据库单例 */
export function getDb(): Database.Database {
  if (_db) return _db;
  const path = getDbPath();
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  _db = new Database(path);
  _db.pragma("journal_mode = WAL");
  _db.pragma("synchronous = NORMAL");
  initSchema(_db);
  return _db;
}


/** 关闭连接，下次 getDb 会重新打开 */
export function closeDb(): void {
  _db?.close();
  _db = null;
}


function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS logs (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      level       TEXT NOT NULL,
      category    TEXT NOT NULL,
      message     TEXT NOT NULL,
      payload     TEXT,
      source_id   TEXT,
      created_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_logs_level    ON logs(level);
    CREATE INDEX IF NOT EXISTS idx_logs_source   ON logs(source_id);
    CREATE INDEX IF NOT EXISTS idx_logs_created  ON logs(created_at);
  `);
}


/** 写入一条日志 */
export function insertLog(entry: LogEntry): void {
  getDb().prepare(`
    INSERT INTO logs (level, category, message, payload, source_id, created_at)
    VALUES (@level, @category, @message, @payload, @sourceId, @createdAt)
  `).run({
    level: entry.level,
    category: entry.category,
    message: entry.message,
    payload: entry.payload ? JSON.stringify(entry.payload) : null,
    sourceId: entry.source_id ?? null,
    createdAt: entry.created_at,
  });
}


/** 按级别与信源查询日志，最新在前 */
export function queryLogs(opts: { level?: LogLevel; sourceId?: string; limit?: number } = {}): DbLog[] {
  const { level, sourceId, limit = 100 } = opts;
  const conditions: string[] = [];
  const params: Record<string, unknown> = { limit };
  if (level) {
    conditions.push("level = @level");
    params.level = level;
  }
  if (sourceId) {
    conditions.push("source_id = @sourceId");
    params.sourceId = sourceId;
  }
  const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
  return getDb().prepare<Record<string, unknown>, DbLog>(`
    SELECT id, level, category, message, payload, source_id, created_at
    FROM logs ${where}
    ORDER BY id DESC
    LIMIT @limit
  `).all(params);
}


/** 日志行结构（snake_case，与 LogEntry 区分） */
export interface DbLog {
  id: number;
  level: string;
  category: string;
  message: string;
  payload: string | null;
  source_id: string | null;
  created_at: string;
}
