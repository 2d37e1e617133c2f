import type { RecurrenceType, RepeatingRecurrenceType } from "@planner/shared";
import { addDays, shiftDays } from "./time";

/**
 * 每种重复类型相邻两次之间的天数
 */
export const RECURRENCE_STEP_DAYS: Record<RepeatingRecurrenceType, number> = {
  daily: 1,
  weekly: 7,
};

/**
 * 未指定 occurrences 时生成的实例数（含第一个实例），约三个月
 */
export const DEFAULT_OCCURRENCES: Record<RepeatingRecurrenceType, number> = {
  daily: 91,
  weekly: 13,
};

export const MAX_OCCURRENCES = 366;

export function isRepeatingType(
  type: RecurrenceType | null | undefined,
): type is RepeatingRecurrenceType {
  return type === "daily" || type === "weekly";
}

/**
 * 单个实例的时间信息
 */
export interface Occurrence {
  dueDate: string;
  startTime: Date | null;
  endTime: Date | null;
}

/**
 * 把第一个实例展开为完整系列
 *
 * 第 i 个实例的 dueDate（以及 startTime/endTime）比第一个实例晚 i 个步长。
 * occurrences 包含第一个实例本身；小于 1 时只返回第一个实例。
 */
export function expandOccurrences(
  first: Occurrence,
  type: RepeatingRecurrenceType,
  occurrences: number = DEFAULT_OCCURRENCES[type],
): Occurrence[] {
  if (occurrences > MAX_OCCURRENCES) {
    throw new RangeError(`Recurring occurrences cannot exceed ${MAX_OCCURRENCES}.`);
  }

  const step = RECURRENCE_STEP_DAYS[type];
  const count = Math.max(1, Math.floor(occurrences));
  const series: Occurrence[] = [];

  for (let i = 0; i < count; i++) {
    const offset = step * i;
    series.push({
      dueDate: addDays(first.dueDate, offset),
      startTime: first.startTime ? shiftDays(first.startTime, offset) : null,
      endTime: first.endTime ? shiftDays(first.endTime, offset) : null,
    });
  }

  return series;
}
