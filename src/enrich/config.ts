// Enrich 配置加载：从 .lanebrief/config.json 读取并发与重试设置，支持环境变量兜底

import { USER_CONFIG_PATH } from "../config/paths.js";
import { readJsonFile, isPlainObject } from "../config/json.js";
import { logger } from "../logger/index.js";
import type { EnrichConfig } from "./types.js";


export const DEFAULT_ENRICH_CONFIG: EnrichConfig = {
  concurrency: 2,
  maxRetries: 2,
};


function toNonNegativeInt(value: unknown, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}


/** 读取 enrich 块，缺失字段用环境变量或默认值补全；文件损坏时记警告并用默认值 */
export async function loadEnrichConfig(path: string = USER_CONFIG_PATH): Promise<EnrichConfig> {
  let fileEnrich: Record<string, unknown> = {};
  try {
    const parsed = await readJsonFile(path);
    if (isPlainObject(parsed) && isPlainObject(parsed.enrich)) {
      fileEnrich = parsed.enrich;
    }
  } catch (err) {
    logger.warn("config", "读取 enrich 配置失败，使用默认值", { path, err: err instanceof Error ? err.message : String(err) });
  }
  const d = DEFAULT_ENRICH_CONFIG;
  return {
    concurrency: Math.max(1, toNonNegativeInt(fileEnrich["concurrency"] ?? process.env.ENRICH_CONCURRENCY, d.concurrency)),
    maxRetries: toNonNegativeInt(fileEnrich["maxRetries"] ?? process.env.ENRICH_MAX_RETRIES, d.maxRetries),
  };
}
