// 对外入口：信任与相关度核心的公共 API

export { sanitizeContent, validateAnnotation, validateField, verifyUrl, INJECTION_RULES, REDACTION_TOKEN } from "./security/index.js";
export type { FieldRule, SanitizeResult, SourceDomains, ValidationResult } from "./security/index.js";

export {
  rankAndSelect,
  computeScore,
  scoreComponents,
  recencyScore,
  laneAffinity,
  clusterItems,
  parentTopic,
  selectForDigest,
  selectCluster,
  bestLane,
  LANE_THRESHOLD,
  NEUTRAL_SCORE,
  UNCATEGORIZED,
  DEFAULT_MIN_CLUSTER_SIZE,
} from "./ranking/index.js";
export type { ClusterSelection, RankingConfig, RecencyConfig, ScoreComponents, ScoringWeights, SelectionConfig, TrustLookup } from "./ranking/index.js";

export { enrichItem, enrichPending, runWithRetries, loadEnrichConfig, DEFAULT_ENRICH_CONFIG } from "./enrich/index.js";
export type { Annotator, EnrichConfig, EnrichItemResult } from "./enrich/index.js";

export { ingestSources, prepareItems, isWithinMaxAge } from "./ingest/index.js";
export type { ItemSource } from "./ingest/index.js";

export { MemoryItemStore, canTransition } from "./store/index.js";
export type { ItemStore } from "./store/index.js";

export { runPipeline } from "./pipeline/index.js";
export type { DigestPublisher, PipelineDeps, PipelineOptions, PipelineResult } from "./pipeline/index.js";

export { loadProfile, laneIds, enabledSources, buildTrustLookup, buildSourceDomains } from "./config/profile.js";
export { loadRankingConfig, DEFAULT_RANKING } from "./config/ranking.js";
export type { Profile, SourceDefinition, LaneDefinition } from "./config/schema.js";

export { parsePublishedAt, toLocalDateString } from "./utils/date.js";
export { logger } from "./logger/index.js";
export { queryLogs, closeDb } from "./db/index.js";
export * from "./errors/index.js";

export { STATUS_ORDER, DEFAULT_LANES } from "./types/item.js";
export type { Annotation, ContentItem, Entity, LaneScores, NewItem, ProcessingStatus, RankingUpdate } from "./types/item.js";
export type { PipelineRun, RunCounts, RunStatus } from "./types/run.js";
