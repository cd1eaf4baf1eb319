// 抓取层接口：把网络信源转成规范化条目，已按 URL 去重

import type { NewItem } from "../types/item.js";
import type { SourceDefinition } from "../config/schema.js";


export interface ItemSource {
  fetchItems(source: SourceDefinition): Promise<NewItem[]>;
}
