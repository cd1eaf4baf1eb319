// 存储接口：核心只通过条目与运行记录的读写操作访问持久层

import type { Annotation, ContentItem, NewItem, RankingUpdate } from "../types/item.js";
import type { PipelineRun, RunCounts, RunStatus } from "../types/run.js";


export interface ItemStore {
  /** 插入新条目，URL 已存在时忽略并返回 false */
  insertItem(item: NewItem, fetchedAt: string): Promise<boolean>;
  getPendingEnrichment(): Promise<ContentItem[]>;
  /** 指定本地日期（按 fetchedAt 换算）已标注、待评分的条目 */
  getEnrichedItems(runDate: string): Promise<ContentItem[]>;
  getItem(id: number): Promise<ContentItem | undefined>;
  /** 写入标注，状态推进到 enriched */
  updateEnrichment(id: number, annotation: Annotation): Promise<void>;
  /** 写入评分与聚类，状态推进到 ranked */
  updateRanking(id: number, update: RankingUpdate): Promise<void>;
  /** 状态推进到 published */
  markPublished(ids: readonly number[]): Promise<void>;

  startRun(runDate: string): Promise<PipelineRun>;
  updateRunCounts(runId: number, counts: RunCounts): Promise<void>;
  /** 结束运行记录，只能调用一次 */
  completeRun(runId: number, status: Exclude<RunStatus, "running">, errorMessage?: string): Promise<PipelineRun>;
  getRun(runId: number): Promise<PipelineRun | undefined>;
}
