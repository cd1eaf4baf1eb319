// 评分、聚类、挑选的配置与结果类型


/** 五项评分因子的权重，约定和为 1，核心不做归一化 */
export interface ScoringWeights {
  recency: number;
  sourceTrust: number;
  laneAffinity: number;
  popularity: number;
  novelty: number;
}


export interface RecencyConfig {
  /** 新鲜度半衰期（小时） */
  halfLifeHours: number;
}


export interface SelectionConfig {
  /** 全局条目预算 */
  targetDigestSize: number;
  /** 每个簇每条关注线最多条目数 */
  maxItemsPerLane: number;
}


export interface RankingConfig {
  weights: ScoringWeights;
  recency: RecencyConfig;
  selection: SelectionConfig;
}


/** 信源 id → 信任权重（0~1），未知信源按 0.5 */
export type TrustLookup = ReadonlyMap<string, number>;


/** 单项评分拆解 */
export interface ScoreComponents {
  recency: number;
  sourceTrust: number;
  laneAffinity: number;
  popularity: number;
  novelty: number;
}


/** 挑选结果：一个簇及其各关注线入选条目；渲染层唯一输入 */
export interface ClusterSelection<T> {
  clusterId: number;
  clusterTopic: string;
  lanes: Record<string, T[]>;
  allItems: T[];
}
