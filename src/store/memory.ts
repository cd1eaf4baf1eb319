// 进程内存储：实现 ItemStore，维护 URL 去重、状态单向推进与运行记录单次完成

import type { Annotation, ContentItem, NewItem, ProcessingStatus, RankingUpdate } from "../types/item.js";
import type { PipelineRun, RunCounts, RunStatus } from "../types/run.js";
import type { ItemStore } from "./types.js";
import { canTransition } from "./lifecycle.js";
import { toLocalDateString } from "../utils/date.js";
import { ItemNotFoundError, RunAlreadyCompletedError, StatusTransitionError } from "../errors/index.js";


function cloneItem(item: ContentItem): ContentItem {
  return structuredClone(item);
}


export class MemoryItemStore implements ItemStore {
  private items = new Map<number, ContentItem>();
  private urlIndex = new Map<string, number>();
  private runs = new Map<number, PipelineRun>();
  private nextItemId = 1;
  private nextRunId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}


  async insertItem(input: NewItem, fetchedAt: string): Promise<boolean> {
    if (this.urlIndex.has(input.url)) return false;
    const id = this.nextItemId++;
    this.items.set(id, {
      ...input,
      id,
      fetchedAt,
      noveltyFlag: false,
      status: "pending_enrichment",
    });
    this.urlIndex.set(input.url, id);
    return true;
  }


  async getPendingEnrichment(): Promise<ContentItem[]> {
    return [...this.items.values()].filter((i) => i.status === "pending_enrichment").map(cloneItem);
  }


  async getEnrichedItems(runDate: string): Promise<ContentItem[]> {
    return [...this.items.values()]
      .filter((i) => i.status === "enriched" && toLocalDateString(new Date(i.fetchedAt)) === runDate)
      .map(cloneItem);
  }


  async getItem(id: number): Promise<ContentItem | undefined> {
    const item = this.items.get(id);
    return item ? cloneItem(item) : undefined;
  }


  /** 所有写操作先校验状态，再落到内部副本 */
  private advance(id: number, to: ProcessingStatus): ContentItem {
    const item = this.items.get(id);
    if (!item) throw new ItemNotFoundError(id);
    if (!canTransition(item.status, to)) throw new StatusTransitionError(id, item.status, to);
    item.status = to;
    return item;
  }


  async updateEnrichment(id: number, annotation: Annotation): Promise<void> {
    const item = this.advance(id, "enriched");
    item.annotation = structuredClone(annotation);
  }


  async updateRanking(id: number, update: RankingUpdate): Promise<void> {
    const item = this.advance(id, "ranked");
    item.relevanceScore = update.relevanceScore;
    item.clusterId = update.clusterId;
    item.clusterTopic = update.clusterTopic;
    item.noveltyFlag = update.noveltyFlag;
  }


  async markPublished(ids: readonly number[]): Promise<void> {
    // 先整体校验，避免部分写入
    for (const id of ids) {
      const item = this.items.get(id);
      if (!item) throw new ItemNotFoundError(id);
      if (!canTransition(item.status, "published")) throw new StatusTransitionError(id, item.status, "published");
    }
    for (const id of ids) this.advance(id, "published");
  }


  async startRun(runDate: string): Promise<PipelineRun> {
    const run: PipelineRun = {
      id: this.nextRunId++,
      runDate,
      startedAt: this.clock().toISOString(),
      status: "running",
      itemsIngested: 0,
      itemsEnriched: 0,
      itemsSelected: 0,
    };
    this.runs.set(run.id, run);
    return { ...run };
  }


  private runningRun(runId: number): PipelineRun {
    const run = this.runs.get(runId);
    if (!run) throw new ItemNotFoundError(`run ${runId}`);
    if (run.status !== "running") throw new RunAlreadyCompletedError(runId);
    return run;
  }


  async updateRunCounts(runId: number, counts: RunCounts): Promise<void> {
    const run = this.runningRun(runId);
    if (counts.itemsIngested !== undefined) run.itemsIngested = counts.itemsIngested;
    if (counts.itemsEnriched !== undefined) run.itemsEnriched = counts.itemsEnriched;
    if (counts.itemsSelected !== undefined) run.itemsSelected = counts.itemsSelected;
  }


  async completeRun(runId: number, status: Exclude<RunStatus, "running">, errorMessage?: string): Promise<PipelineRun> {
    const run = this.runningRun(runId);
    run.status = status;
    run.completedAt = this.clock().toISOString();
    if (errorMessage !== undefined) run.errorMessage = errorMessage;
    return { ...run };
  }


  async getRun(runId: number): Promise<PipelineRun | undefined> {
    const run = this.runs.get(runId);
    return run ? { ...run } : undefined;
  }
}
