// JSON 配置读取：文件不存在返回 null，解析失败抛 ConfigError

import { readFile } from "node:fs/promises";
import { ConfigError } from "../errors/index.js";


export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(path, err instanceof Error ? err.message : String(err));
  }
}


export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
