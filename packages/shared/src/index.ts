// 统一导出所有类型

// 通用类型
export type {
  RecurrenceType,
  RepeatingRecurrenceType,
  ChangeScope,
  JournalContent,
} from "./types/common";

// API响应类型
export type {
  ApiSuccessResponse,
  ApiErrorResponse,
  FieldError,
} from "./api/response";

// 任务相关类型
export type {
  CreateTaskInput,
  UpdateTaskInput,
  TaskFilters,
  TaskInfo,
} from "./api/tasks";

// 日程相关类型
export type { CreateEventInput, UpdateEventInput, EventFilters, EventInfo } from "./api/events";

// 日志相关类型
export type {
  CreateJournalEntryInput,
  UpdateJournalEntryInput,
  JournalFilters,
  JournalEntryInfo,
} from "./api/journal";
