// 文本工具


/** 按码点截断，不切断代理对 */
export function truncateCodePoints(s: string, max: number): string {
  if (s.length <= max) return s;
  const chars = Array.from(s);
  return chars.length <= max ? s : chars.slice(0, max).join("");
}
