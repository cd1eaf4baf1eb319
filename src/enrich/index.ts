// 标注步骤：清洗 → 调用模型标注层 → 校验修复 → 回写，单条失败不阻塞整批

import type { Annotation, ContentItem } from "../types/item.js";
import type { ItemStore } from "../store/types.js";
import { sanitizeContent } from "../security/sanitize.js";
import { validateAnnotation } from "../security/validate.js";
import { truncateCodePoints } from "../utils/text.js";
import { logger } from "../logger/index.js";
import { runWithRetries } from "./runner.js";
import type { Annotator, EnrichConfig } from "./types.js";


/** 送入模型的正文上限（码点） */
export const MAX_ANNOTATION_INPUT_CHARS = 5000;


/** 单条目：清洗后的正文交给 annotator，返回修复后的标注 */
export async function enrichItem(item: ContentItem, annotator: Annotator, lanes: readonly string[]): Promise<Annotation> {
  const { text } = sanitizeContent(item.rawText ?? "", item.sourceId);
  const raw = await annotator.annotate(item, truncateCodePoints(text, MAX_ANNOTATION_INPUT_CHARS));
  const { isValid, cleaned, errors } = validateAnnotation(raw, lanes);
  if (!isValid) {
    logger.warn("enrich", "标注校验未通过，使用修复后的结果", { itemId: item.id, errors, source_id: item.sourceId });
  }
  return cleaned;
}


/** 标注所有待处理条目，返回成功数量 */
export async function enrichPending(
  store: ItemStore,
  annotator: Annotator,
  lanes: readonly string[],
  config: EnrichConfig,
): Promise<number> {
  const pending = await store.getPendingEnrichment();
  if (pending.length === 0) {
    logger.info("enrich", "没有待标注的条目");
    return 0;
  }

  const results = await runWithRetries(
    pending,
    async (item) => {
      const annotation = await enrichItem(item, annotator, lanes);
      await store.updateEnrichment(item.id, annotation);
      return annotation;
    },
    config,
    {
      onRetry: (item, attempt, err) =>
        logger.warn("enrich", `标注失败，第 ${attempt}/${config.maxRetries} 次重试`, { itemId: item.id, err }),
      onFailed: (item, err) =>
        logger.error("enrich", "标注最终失败，条目保留待处理", { itemId: item.id, err, source_id: item.sourceId }),
    },
  );

  const done = results.filter((r) => r.status === "done").length;
  logger.info("enrich", "标注完成", { total: pending.length, done, failed: pending.length - done });
  return done;
}


export { loadEnrichConfig, DEFAULT_ENRICH_CONFIG } from "./config.js";
export { runWithRetries } from "./runner.js";
export type { Annotator, EnrichConfig, EnrichItemResult, EnrichItemStatus } from "./types.js";
