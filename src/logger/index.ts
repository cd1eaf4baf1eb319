// 统一日志：按级别输出到控制台，warn/error 可落库

import { insertLog } from "../db/index.js";
import {
  getConsoleLevel,
  getLogToDb,
  getDbLevel,
  shouldLogToConsole,
  shouldLogToDb,
} from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";


/** 控制台行：source_id 落库时单独成列，打印时放回 payload 首位 */
export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const fields = entry.source_id != null ? { source_id: entry.source_id, ...entry.payload } : entry.payload;
  const payloadStr =
    fields != null && Object.keys(fields).length > 0
      ? " " + JSON.stringify(fields)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}


function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}


function writeDb(entry: LogEntry): void {
  try {
    insertLog(entry);
  } catch (err) {
    // 落库失败只打一次 stderr，避免循环
    process.stderr.write(`[logger] 写入日志表失败: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}


function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  let source_id: string | undefined;
  let payload: Record<string, unknown> | undefined;
  if (meta) {
    const { source_id: sid, ...rest } = meta;
    source_id = sid;
    payload = Object.keys(rest).length > 0 ? rest : undefined;
  }
  const entry: LogEntry = {
    level,
    category,
    message,
    payload,
    source_id,
    created_at: new Date().toISOString(),
  };

  if (shouldLogToConsole(getConsoleLevel(), level)) {
    writeConsole(entry);
  }

  if (shouldLogToDb(getLogToDb(), getDbLevel(), level)) {
    writeDb(entry);
  }
}


/** 统一 logger：warn/error 可落库，控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};


export type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";
