// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info）；warn/error 可落库，便于按信源排查注入与标注问题。

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按流水线阶段筛选 */
export type LogCategory =
  | "security" // 注入清洗、链接校验
  | "enrich"   // 模型标注与校验
  | "ingest"   // 信源拉取与入库
  | "rank"     // 评分、聚类、挑选
  | "pipeline" // 整体运行
  | "store"    // 条目存储
  | "deliver"  // 发布
  | "config"   // 配置加载
  | "db";      // 日志库

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、itemId 等），落库时存为 JSON */
  payload?: Record<string, unknown>;
  /** 信源标识，便于按信源查日志 */
  source_id?: string;
  created_at: string;
}

/** logger 方法的第三个参数 */
export type LogMeta = { source_id?: string; [k: string]: unknown };
