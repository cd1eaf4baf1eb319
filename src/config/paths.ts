// 路径配置：集中管理运行时路径，区分项目配置与用户数据

import { join } from "node:path";


/** 用户数据根目录：.lanebrief/（不纳入版本管理） */
export const USER_DIR = join(process.cwd(), ".lanebrief");


/** SQLite 日志库目录：.lanebrief/data/ */
export const DATA_DIR = join(USER_DIR, "data");


/** 用户级运行参数：.lanebrief/config.json（enrich 并发与重试） */
export const USER_CONFIG_PATH = join(USER_DIR, "config.json");


/** 项目配置目录：config/（纳入版本管理） */
export const CONFIG_DIR = join(process.cwd(), "config");


/** profile 目录：config/profiles/<name>.json，可叠加 <name>.local.json */
export const PROFILES_DIR = join(CONFIG_DIR, "profiles");


/** 评分权重与挑选目标：config/ranking.json */
export const RANKING_CONFIG_PATH = join(CONFIG_DIR, "ranking.json");


/** 日志库文件路径，LANEBRIEF_DB_PATH 可覆盖（支持 :memory:） */
export function getDbPath(): string {
  return process.env.LANEBRIEF_DB_PATH || join(DATA_DIR, "lanebrief.db");
}
