/**
 * 系统内部统一的条目定义
 * 抓取层 → 标注层 → 评分/聚类/挑选 → 发布层
 */


/** 条目处理状态，只能单向推进 */
export type ProcessingStatus = "pending_enrichment" | "enriched" | "ranked" | "published";


/** 状态推进顺序，下标越大越靠后 */
export const STATUS_ORDER: readonly ProcessingStatus[] = ["pending_enrichment", "enriched", "ranked", "published"];


/** 默认三条关注线；配置中可扩展为任意 N 条 */
export const DEFAULT_LANES = ["builders", "security", "business"] as const;


/** 关注线 id → 亲和度（0~1） */
export type LaneScores = Record<string, number>;


/** 模型抽取的实体 */
export interface Entity {
  name: string;
  type: string;
}


/** 经校验后的模型标注 */
export interface Annotation {
  /** 一两句话摘要，最多 500 字符 */
  summaryShort: string;
  /** 段落摘要，最多 2000 字符 */
  summaryLong: string;
  /** 有序话题标签，形如 "agents > orchestration" */
  topics: string[];
  entities: Entity[];
  lanes: LaneScores;
}


/** 抓取层交给核心的原始条目（已按 URL 去重） */
export interface NewItem {
  title: string;
  url: string;
  sourceId: string;
  sourceName: string;
  /** 抓取方式：rss / api / scrape */
  sourceType: string;
  publishedAt?: string | null;
  contentType?: string | null;
  rawText?: string | null;
}


/** 入库后的条目 */
export interface ContentItem extends NewItem {
  id: number;
  fetchedAt: string;
  annotation?: Annotation;
  relevanceScore?: number;
  clusterId?: number;
  clusterTopic?: string;
  noveltyFlag: boolean;
  status: ProcessingStatus;
}


/** 评分/聚类结果回写 */
export interface RankingUpdate {
  relevanceScore: number;
  clusterId: number;
  clusterTopic: string;
  noveltyFlag: boolean;
}
