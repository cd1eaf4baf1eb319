// 入库步骤：逐个信源拉取 → 链接校验 → 时效过滤 → 清洗 → 去重写入

import type { NewItem } from "../types/item.js";
import type { ItemStore } from "../store/types.js";
import type { Profile } from "../config/schema.js";
import { buildSourceDomains, enabledSources } from "../config/profile.js";
import { sanitizeContent } from "../security/sanitize.js";
import { verifyUrl } from "../security/verifyUrl.js";
import type { SourceDomains } from "../security/verifyUrl.js";
import { parsePublishedAt } from "../utils/date.js";
import { logger } from "../logger/index.js";
import type { ItemSource } from "./types.js";


const DAY_MS = 24 * 60 * 60 * 1000;


/** 发布时间早于 now - maxAgeDays 的条目过期；无日期或无法解析的保留 */
export function isWithinMaxAge(publishedAt: string | null | undefined, maxAgeDays: number, now: Date): boolean {
  const published = parsePublishedAt(publishedAt);
  if (!published) return true;
  return published.getTime() >= now.getTime() - maxAgeDays * DAY_MS;
}


/** 过滤并清洗单个信源的条目 */
export function prepareItems(items: readonly NewItem[], domains: SourceDomains, maxAgeDays: number, now: Date): NewItem[] {
  const prepared: NewItem[] = [];
  for (const item of items) {
    if (!verifyUrl(item.url, item.sourceId, domains)) continue;
    if (!isWithinMaxAge(item.publishedAt, maxAgeDays, now)) continue;
    const { text } = sanitizeContent(item.rawText, item.sourceId);
    prepared.push({ ...item, rawText: text });
  }
  return prepared;
}


/** 拉取全部启用信源，返回新增条目数；单个信源失败只记日志 */
export async function ingestSources(store: ItemStore, itemSource: ItemSource, profile: Profile, now: Date): Promise<number> {
  const domains = buildSourceDomains(profile.sources);
  const fetchedAt = now.toISOString();
  let totalNew = 0;

  for (const source of enabledSources(profile)) {
    const started = Date.now();
    try {
      const fetched = await itemSource.fetchItems(source);
      const items = prepareItems(fetched, domains, profile.maxAgeDays, now);
      let newCount = 0;
      for (const item of items) {
        if (await store.insertItem(item, fetchedAt)) newCount++;
      }
      totalNew += newCount;
      logger.info("ingest", "信源入库完成", {
        source_id: source.slug,
        fetched: fetched.length,
        inserted: newCount,
        elapsedMs: Date.now() - started,
      });
    } catch (err) {
      logger.error("ingest", "信源拉取失败", {
        source_id: source.slug,
        err: err instanceof Error ? err.message : String(err),
        elapsedMs: Date.now() - started,
      });
    }
  }
  return totalNew;
}


export type { ItemSource } from "./types.js";
