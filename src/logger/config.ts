// 日志配置：从环境变量读取，不依赖 profile 以尽早可用

import "dotenv/config";
import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return (LEVEL_ORDER as string[]).includes(s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** 当前控制台最低输出级别（默认 info） */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

/** 是否将 warn/error 写入日志库（默认 true） */
export function getLogToDb(): boolean {
  const v = process.env.LOG_TO_DB;
  if (v === "0" || v === "false") return false;
  return true;
}

/** 落库的最低级别（默认 warn） */
export function getDbLevel(): LogLevel {
  return parseLevel(process.env.LOG_DB_LEVEL, "warn");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}

export function shouldLogToDb(logToDb: boolean, dbLevel: LogLevel, entryLevel: LogLevel): boolean {
  return logToDb && levelOrder(entryLevel) >= levelOrder(dbLevel);
}
