import {
  pgTable,
  serial,
  varchar,
  text,
  timestamp,
  boolean,
  integer,
  jsonb,
  pgEnum,
  date,
  index,
  check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { JournalContent } from "@planner/shared";

// ==================== 枚举定义 ====================
// 注意：所有枚举必须在表定义之前声明

// 任务重复类型枚举
export const recurrenceTypeEnum = pgEnum("recurrence_type", ["none", "daily", "weekly"]);

// ==================== 业务表 ====================

// 任务表
export const tasks = pgTable(
  "tasks",
  {
    id: serial("id").primaryKey(),

    // 基本信息
    title: varchar("title", { length: 100 }).notNull(),
    description: text("description"),
    isCompleted: boolean("is_completed").notNull().default(false),

    // 时间字段
    dueDate: date("due_date", { mode: "string" }).notNull(),
    startTime: timestamp("start_time", { withTimezone: true }),
    endTime: timestamp("end_time", { withTimezone: true }),
    timeTrackedSeconds: integer("time_tracked_seconds").notNull().default(0),

    // 重复任务逻辑：同一系列的实例共享 recurrenceGroupId
    isRecurring: boolean("is_recurring").notNull().default(false),
    recurrenceType: recurrenceTypeEnum("recurrence_type").notNull().default("none"),
    recurrenceGroupId: varchar("recurrence_group_id", { length: 36 }),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    recurrenceGroupIdx: index("tasks_recurrence_group_id_idx").on(table.recurrenceGroupId),
    // recurrenceGroupId 当且仅当 isRecurring 时存在
    recurrenceConsistency: check(
      "tasks_recurrence_consistency",
      sql`(${table.isRecurring} AND ${table.recurrenceGroupId} IS NOT NULL AND ${table.recurrenceType} <> 'none') OR (NOT ${table.isRecurring} AND ${table.recurrenceGroupId} IS NULL AND ${table.recurrenceType} = 'none')`,
    ),
  }),
);

// 日程表
export const events = pgTable("events", {
  id: serial("id").primaryKey(),
  title: varchar("title", { length: 100 }).notNull(),
  description: text("description"),
  startTime: timestamp("start_time", { withTimezone: true }).notNull(),
  endTime: timestamp("end_time", { withTimezone: true }), // 可以只有开始时间
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

// 日志表（饮食、睡眠、心情等）
export const journalEntries = pgTable(
  "journal_entries",
  {
    id: serial("id").primaryKey(),
    entryType: varchar("entry_type", { length: 50 }).notNull(), // meal / sleep / mood
    content: jsonb("content").$type<JournalContent>().notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    timestampIdx: index("journal_entries_timestamp_idx").on(table.timestamp),
  }),
);
