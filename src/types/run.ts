// 流水线运行记录：每次调用一条，只追加，完成时更新一次


export type RunStatus = "running" | "completed" | "failed";


export interface PipelineRun {
  id: number;
  /** 本地日期 YYYY-MM-DD */
  runDate: string;
  startedAt: string;
  completedAt?: string;
  status: RunStatus;
  itemsIngested: number;
  itemsEnriched: number;
  itemsSelected: number;
  errorMessage?: string;
}


/** 运行中可更新的计数字段 */
export type RunCounts = Partial<Pick<PipelineRun, "itemsIngested" | "itemsEnriched" | "itemsSelected">>;
