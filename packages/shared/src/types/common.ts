// 通用类型定义

// 重复类型
export type RecurrenceType = "none" | "daily" | "weekly";

// 会生成实例的重复类型
export type RepeatingRecurrenceType = Exclude<RecurrenceType, "none">;

// 操作范围：仅当前实例 / 当前及之后的所有实例
export type ChangeScope = "single" | "all_future";

// 日志内容（半结构化键值对）
export type JournalContent = Record<string, unknown>;
