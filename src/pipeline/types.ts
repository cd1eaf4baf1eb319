// 流水线依赖与结果类型

import type { ContentItem } from "../types/item.js";
import type { PipelineRun } from "../types/run.js";
import type { Profile } from "../config/schema.js";
import type { ItemStore } from "../store/types.js";
import type { ItemSource } from "../ingest/types.js";
import type { Annotator, EnrichConfig } from "../enrich/types.js";
import type { ClusterSelection, RankingConfig } from "../ranking/types.js";


/** 渲染/投递层：返回文档位置；该日期已投递过时返回 null */
export interface DigestPublisher {
  publish(runDate: string, clusters: ClusterSelection<ContentItem>[], profile: Profile): Promise<string | null>;
  publishError(runDate: string, message: string, profile: Profile): Promise<string | null>;
}


export interface PipelineDeps {
  store: ItemStore;
  itemSource: ItemSource;
  annotator: Annotator;
  publisher: DigestPublisher;
}


export interface PipelineOptions {
  profile: Profile;
  ranking: RankingConfig;
  enrich: EnrichConfig;
  /** 参考时间，决定运行日期与新鲜度 */
  now?: Date;
}


export interface PipelineResult {
  run: PipelineRun;
  clusters: ClusterSelection<ContentItem>[];
  /** 摘要文档位置；失败时为错误页位置 */
  location: string | null;
}
