// 日期工具：ISO 时间解析与本地日期分段，供评分、入库与运行记录共用


const ISO_RE = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;


/** 日期分量须原样往返，2 月 30 日之类不会被顺延 */
function isCalendarDate(date: string): boolean {
  const [y, m, d] = date.split("-").map(Number);
  const utc = new Date(Date.UTC(y, m - 1, d));
  return utc.getUTCFullYear() === y && utc.getUTCMonth() === m - 1 && utc.getUTCDate() === d;
}


function isClockTime(time: string): boolean {
  const [h, min, sec = 0] = time.split(":").map(Number);
  return h <= 23 && min <= 59 && sec < 60;
}


/** 解析 ISO 时间；无时区的按 UTC 处理，无法解析返回 null */
export function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) return null;
  const m = ISO_RE.exec(value.trim());
  if (!m) return null;
  const [, date, time, zone] = m;
  if (!isCalendarDate(date) || (time && !isClockTime(time))) return null;
  let iso = date;
  if (time) {
    let tz = zone ?? "Z";
    if (/^[+-]\d{2}$/.test(tz)) tz += ":00";
    else if (/^[+-]\d{4}$/.test(tz)) tz = `${tz.slice(0, 3)}:${tz.slice(3)}`;
    iso = `${date}T${time}${tz.toUpperCase()}`;
  }
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? null : d;
}


/** 本地日期 YYYY-MM-DD，用作运行日期 */
export function toLocalDateString(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}
