// 流水线编排：入库 → 标注 → 排序挑选 → 发布，失败时记录运行状态并投递错误页

import type { ContentItem } from "../types/item.js";
import type { ClusterSelection } from "../ranking/types.js";
import { enabledSources, laneIds } from "../config/profile.js";
import { ingestSources } from "../ingest/index.js";
import { enrichPending } from "../enrich/index.js";
import { rankAndSelect } from "../ranking/index.js";
import { toLocalDateString } from "../utils/date.js";
import { logger } from "../logger/index.js";
import type { PipelineDeps, PipelineOptions, PipelineResult } from "./types.js";


function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<PipelineResult> {
  const { store, itemSource, annotator, publisher } = deps;
  const { profile, ranking, enrich } = options;
  const now = options.now ?? new Date();
  const runDate = toLocalDateString(now);

  const started = await store.startRun(runDate);
  logger.info("pipeline", "开始运行", { profile: profile.name, runDate, runId: started.id });

  try {
    const sources = enabledSources(profile);
    logger.info("pipeline", "信源统计", { total: profile.sources.length, enabled: sources.length });
    if (sources.length === 0) {
      logger.warn("pipeline", "没有启用的信源，跳过本次运行", { profile: profile.name });
      const run = await store.completeRun(started.id, "completed");
      return { run, clusters: [], location: null };
    }

    const itemsIngested = await ingestSources(store, itemSource, profile, now);
    await store.updateRunCounts(started.id, { itemsIngested });

    const itemsEnriched = await enrichPending(store, annotator, laneIds(profile), enrich);
    await store.updateRunCounts(started.id, { itemsEnriched });

    const clusters: ClusterSelection<ContentItem>[] = await rankAndSelect(store, profile, ranking, runDate, now);
    const selectedIds = clusters.flatMap((c) => c.allItems.map((item) => item.id));
    await store.updateRunCounts(started.id, { itemsSelected: selectedIds.length });

    const location = await publisher.publish(runDate, clusters, profile);
    if (location) {
      if (selectedIds.length > 0) await store.markPublished(selectedIds);
      logger.info("deliver", "摘要已发布", { location, items: selectedIds.length });
    } else {
      logger.info("deliver", "该日期已发布过，跳过", { runDate });
    }

    const run = await store.completeRun(started.id, "completed");
    logger.info("pipeline", "运行完成", { runId: run.id, ingested: itemsIngested, enriched: itemsEnriched, selected: selectedIds.length });
    return { run, clusters, location };
  } catch (err) {
    const message = errorMessage(err);
    logger.error("pipeline", "运行失败", { runId: started.id, err: message });
    const run = await store.completeRun(started.id, "failed", message);
    let location: string | null = null;
    try {
      location = await publisher.publishError(runDate, message, profile);
    } catch (publishErr) {
      logger.error("deliver", "错误页投递失败", { err: errorMessage(publishErr) });
    }
    return { run, clusters: [], location };
  }
}


export type { DigestPublisher, PipelineDeps, PipelineOptions, PipelineResult } from "./types.js";
