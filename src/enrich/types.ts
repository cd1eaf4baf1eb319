// 标注步骤类型定义

import type { ContentItem } from "../types/item.js";


/** 模型标注层：返回未经校验的原始映射，可能畸形 */
export interface Annotator {
  annotate(item: ContentItem, sanitizedText: string): Promise<unknown>;
}


/** 单条目执行状态 */
export type EnrichItemStatus = "pending" | "running" | "done" | "failed";


/** 单条目执行结果 */
export interface EnrichItemResult<R> {
  index: number;
  status: EnrichItemStatus;
  /** 成功后填入 */
  value?: R;
  error?: string;
  retries: number;
}


/** 来自 .lanebrief/config.json 的 enrich 配置 */
export interface EnrichConfig {
  /** 同时进行的标注请求数量，默认 2 */
  concurrency: number;
  /** 单条目失败重试次数（不含首次），默认 2 */
  maxRetries: number;
}
