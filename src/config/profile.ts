// Profile 加载：config/profiles/<name>.json，存在 <name>.local.json 时浅合并覆盖

import { join } from "node:path";
import { PROFILES_DIR } from "./paths.js";
import { readJsonFile, isPlainObject } from "./json.js";
import { ProfileSchema, formatIssues } from "./schema.js";
import type { Profile, SourceDefinition } from "./schema.js";
import { ConfigError, ProfileNotFoundError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { TrustLookup } from "../ranking/types.js";
import type { SourceDomains } from "../security/verifyUrl.js";


/** 读取并校验 profile；本地覆盖文件只做顶层字段替换 */
export async function loadProfile(name: string, dir: string = PROFILES_DIR): Promise<Profile> {
  const path = join(dir, `${name}.json`);
  const base = await readJsonFile(path);
  if (base === null) throw new ProfileNotFoundError(path);
  if (!isPlainObject(base)) throw new ConfigError(path, "profile 应为 JSON 对象");

  let merged: Record<string, unknown> = base;
  const localPath = join(dir, `${name}.local.json`);
  const local = await readJsonFile(localPath);
  if (local !== null) {
    if (!isPlainObject(local)) throw new ConfigError(localPath, "profile 应为 JSON 对象");
    merged = { ...base, ...local };
    logger.info("config", "已合并本地覆盖", { profile: name, file: `${name}.local.json` });
  }

  const parsed = ProfileSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(path, formatIssues(parsed.error));
  return parsed.data;
}


/** profile 中的关注线 id，按声明顺序 */
export function laneIds(profile: Profile): string[] {
  return Object.keys(profile.lanes);
}


/** 启用的信源 */
export function enabledSources(profile: Profile): SourceDefinition[] {
  return profile.sources.filter((s) => s.enabled);
}


/** 信源信任表 */
export function buildTrustLookup(sources: readonly SourceDefinition[]): TrustLookup {
  return new Map(sources.map((s) => [s.slug, s.trustWeight]));
}


/** 信源域名表，供链接校验 */
export function buildSourceDomains(sources: readonly SourceDefinition[]): SourceDomains {
  return new Map(sources.map((s) => [s.slug, s.domains]));
}
