// 条目生命周期：pending_enrichment → enriched → ranked → published，只进不退

import { STATUS_ORDER } from "../types/item.js";
import type { ProcessingStatus } from "../types/item.js";


/** 允许停留在当前状态或向后推进 */
export function canTransition(from: ProcessingStatus, to: ProcessingStatus): boolean {
  return STATUS_ORDER.indexOf(to) >= STATUS_ORDER.indexOf(from);
}
