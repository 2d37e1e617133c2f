import type { RecurrenceType } from "../types/common";

// 创建任务输入类型
export interface CreateTaskInput {
  title: string;
  description?: string | null;
  dueDate: string;
  startTime?: string | null;
  endTime?: string | null;
  isRecurring?: boolean;
  recurrenceType?: RecurrenceType;
  occurrences?: number;
}

// 更新任务输入类型
export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  isCompleted?: boolean;
  timeTrackedSeconds?: number;
  dueDate?: string;
  startTime?: string | null;
  endTime?: string | null;
}

// 任务筛选器类型
export interface TaskFilters {
  recurrenceGroupId?: string;
  dueFrom?: string;
  dueTo?: string;
  isCompleted?: boolean;
}

// 任务信息类型（对外 JSON 字段使用 snake_case）
export interface TaskInfo {
  id: number;
  title: string;
  description: string | null;
  is_recurring: boolean;
  recurrence_type: RecurrenceType;
  recurrence_group_id: string | null;
  is_completed: boolean;
  due_date: string;
  start_time: string | null;
  end_time: string | null;
  time_tracked_seconds: number;
  created_at: string;
}
