const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME =
  /^\d{4}-\d{2}-\d{2}[T ]([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?(Z|[+-]([01]\d|2[0-3]):?[0-5]\d)?$/;

export function toUtcIso(value: Date | string): string;
export function toUtcIso(value: Date | string | null | undefined): string | null;
export function toUtcIso(value: null | undefined): null;
export function toUtcIso(value: Date | string | null | undefined): string | null {
  // 统一按 UTC 解析与输出，避免无时区字符串被 JS 当成本地时区而产生偏移
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  const trimmed = value.trim();
  if (!trimmed) return null;
  const normalized = hasTimezoneInfo(trimmed) ? trimmed : `${trimmed.replace(" ", "T")}Z`;
  return new Date(normalized).toISOString();
}

function hasTimezoneInfo(value: string): boolean {
  // 保留已有时区语义，避免重复追加 Z 或改写偏移信息
  return /Z$/.test(value) || /[+-]\d{2}:?\d{2}$/.test(value);
}

/**
 * 校验 YYYY-MM-DD 是真实存在的日历日期（拒绝 2025-02-30 这类会被 Date 自动进位的值）
 */
function isCalendarDate(value: string): boolean {
  const match = DATE_ONLY.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

/**
 * 解析 ISO 8601 日期时间；无时区信息时按 UTC 处理
 *
 * @returns Date，无法解析时返回 null
 */
export function parseDateTime(value: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_DATETIME.test(trimmed) || !isCalendarDate(trimmed.slice(0, 10))) {
    return null;
  }
  // 先构造 Date 再判断是否有效，toISOString 遇到 Invalid Date 会抛 RangeError
  const normalized = trimmed.replace(" ", "T");
  const parsed = new Date(hasTimezoneInfo(normalized) ? normalized : `${normalized}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * 将 "YYYY-MM-DD" 或 ISO 日期时间规范化为 "YYYY-MM-DD"
 * 日期时间取其书写时的日期部分，不做时区换算
 */
export function toDateOnly(value: string): string | null {
  const trimmed = value.trim();
  if (DATE_ONLY.test(trimmed)) {
    return isCalendarDate(trimmed) ? trimmed : null;
  }
  return parseDateTime(trimmed) ? trimmed.slice(0, 10) : null;
}

/**
 * YYYY-MM-DD 加减天数（按 UTC 计算，不受夏令时影响）
 */
export function addDays(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * DAY_MS);
  return shifted.toISOString().slice(0, 10);
}

/**
 * Date 平移整数天
 */
export function shiftDays(value: Date, days: number): Date {
  return new Date(value.getTime() + days * DAY_MS);
}
