// 领域错误：调用方按 name 区分处理

import type { ProcessingStatus } from "../types/item.js";


export class ProfileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`未找到 profile 配置: ${path}`);
    this.name = "ProfileNotFoundError";
  }
}


export class ConfigError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`配置无效 ${path}: ${message}`);
    this.name = "ConfigError";
  }
}


export class StatusTransitionError extends Error {
  constructor(itemId: number, from: ProcessingStatus, to: ProcessingStatus) {
    super(`条目 ${itemId} 状态不能从 ${from} 回退到 ${to}`);
    this.name = "StatusTransitionError";
  }
}


export class RunAlreadyCompletedError extends Error {
  constructor(runId: number) {
    super(`运行记录 ${runId} 已结束，不能再次完成`);
    this.name = "RunAlreadyCompletedError";
  }
}


export class ItemNotFoundError extends Error {
  constructor(id: number | string) {
    super(`未找到条目或运行记录: ${id}`);
    this.name = "ItemNotFoundError";
  }
}
