// 标注执行器：并发上限内消费工作单元，失败按剩余次数重新入队

import { logger } from "../logger/index.js";
import type { EnrichConfig, EnrichItemResult } from "./types.js";


/** 待执行工作单元 */
interface PendingWork {
  itemIndex: number;
  retries: number;
}


export interface RunHooks<T> {
  /** 失败后将重试时回调 */
  onRetry?: (item: T, attempt: number, error: string) => void;
  /** 重试耗尽时回调 */
  onFailed?: (item: T, error: string) => void;
}


function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


/** 回调异常只记日志，不影响条目结算 */
function callHook(hook: () => void): void {
  try {
    hook();
  } catch (err) {
    logger.warn("enrich", "执行器回调抛出异常", { err: errorMessage(err) });
  }
}


/** 执行整批任务，所有条目结束（done/failed）后 resolve，不会 reject */
export function runWithRetries<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  config: EnrichConfig,
  hooks: RunHooks<T> = {},
): Promise<EnrichItemResult<R>[]> {
  const results: EnrichItemResult<R>[] = items.map((_, index) => ({ index, status: "pending", retries: 0 }));
  if (items.length === 0) return Promise.resolve(results);

  const concurrency = Math.max(1, config.concurrency);
  const pendingWork: PendingWork[] = items.map((_, itemIndex) => ({ itemIndex, retries: 0 }));
  let running = 0;
  let settled = 0;

  return new Promise((resolve) => {
    const processItem = async ({ itemIndex, retries }: PendingWork): Promise<void> => {
      const result = results[itemIndex];
      const item = items[itemIndex];
      result.status = "running";
      result.retries = retries;
      let requeued = false;
      try {
        result.value = await worker(item);
        result.status = "done";
      } catch (err) {
        const message = errorMessage(err);
        if (retries < config.maxRetries) {
          result.status = "pending";
          pendingWork.push({ itemIndex, retries: retries + 1 });
          requeued = true;
          callHook(() => hooks.onRetry?.(item, retries + 1, message));
        } else {
          result.status = "failed";
          result.error = message;
          callHook(() => hooks.onFailed?.(item, message));
        }
      } finally {
        if (!requeued) {
          settled++;
          if (settled === items.length) resolve(results);
        }
      }
    };

    const drain = (): void => {
      while (running < concurrency && pendingWork.length > 0) {
        const work = pendingWork.shift();
        if (!work) break;
        running++;
        void processItem(work).finally(() => {
          running--;
          drain();
        });
      }
    };

    drain();
  });
}
