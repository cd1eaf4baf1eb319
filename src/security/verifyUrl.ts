// 链接校验：条目 URL 的域名须属于信源声明的域名

import { logger } from "../logger/index.js";


/** 信源 id → 允许的域名列表 */
export type SourceDomains = ReadonlyMap<string, readonly string[]>;


function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}


/** 无 URL 或信源未声明域名时放行；否则要求域名相同或为其子域 */
export function verifyUrl(url: string | null | undefined, sourceId: string, domains: SourceDomains): boolean {
  const expected = domains.get(sourceId);
  if (!url || !expected || expected.length === 0) return true;

  const host = hostnameOf(url);
  if (host) {
    for (const domain of expected) {
      const d = domain.toLowerCase();
      if (host === d || host.endsWith("." + d)) return true;
    }
  }

  logger.warn("security", "链接域名与信源不符", { source_id: sourceId, expected, host: host ?? "", url });
  return false;
}
