import { randomUUID } from "node:crypto";
import { and, asc, eq, gte, lte, ne } from "drizzle-orm";
import type { DbInstance } from "../db/db";
import { tasks } from "../db/schema";
import { parseDateTime, toDateOnly, toUtcIso } from "../utils/time";
import { expandOccurrences, isRepeatingType, MAX_OCCURRENCES } from "../utils/recurrence";
import { notFound, validationError } from "../utils/error-handler";
import type {
  ChangeScope,
  CreateTaskInput,
  UpdateTaskInput,
  TaskFilters,
  TaskInfo,
} from "@planner/shared";

type TaskRow = typeof tasks.$inferSelect;

/**
 * 任务Service层
 * 处理任务相关的业务逻辑，包括重复任务的展开与按系列删除
 */
export class TaskService {
  constructor(private db: DbInstance) {}

  private toTaskInfo(task: TaskRow): TaskInfo {
    return {
      id: task.id,
      title: task.title,
      description: task.description,
      is_recurring: task.isRecurring,
      recurrence_type: task.recurrenceType,
      recurrence_group_id: task.recurrenceGroupId,
      is_completed: task.isCompleted,
      due_date: task.dueDate,
      // 统一按 UTC 输出，避免无时区时间被按本地时区解析导致偏移
      start_time: toUtcIso(task.startTime),
      end_time: toUtcIso(task.endTime),
      time_tracked_seconds: task.timeTrackedSeconds,
      created_at: toUtcIso(task.createdAt),
    };
  }

  private async findTask(taskId: number): Promise<TaskRow> {
    const task = await this.db.query.tasks.findFirst({
      where: eq(tasks.id, taskId),
    });

    if (!task) {
      throw notFound("Task");
    }
    return task;
  }

  private parseDueDate(value: string): string {
    const dueDate = toDateOnly(value);
    if (!dueDate) {
      throw validationError("due_date must be a YYYY-MM-DD date or ISO 8601 datetime.", "due_date");
    }
    return dueDate;
  }

  private parseOptionalTime(value: string | null | undefined, field: string): Date | null {
    if (value === null || value === undefined || value === "") return null;
    const parsed = parseDateTime(value);
    if (!parsed) {
      throw validationError(`${field} must be an ISO 8601 datetime.`, field);
    }
    return parsed;
  }

  private validateTimeRange(startTime: Date | null, endTime: Date | null) {
    if (startTime && endTime && endTime < startTime) {
      throw validationError("end_time cannot be before start_time.", "end_time");
    }
  }

  /**
   * 获取任务列表，按 due_date、id 升序
   */
  async getTasks(filters: TaskFilters = {}): Promise<TaskInfo[]> {
    const conditions = [];

    if (filters.recurrenceGroupId) {
      conditions.push(eq(tasks.recurrenceGroupId, filters.recurrenceGroupId));
    }
    if (filters.dueFrom) {
      conditions.push(gte(tasks.dueDate, this.parseDueDate(filters.dueFrom)));
    }
    if (filters.dueTo) {
      conditions.push(lte(tasks.dueDate, this.parseDueDate(filters.dueTo)));
    }
    if (filters.isCompleted !== undefined) {
      conditions.push(eq(tasks.isCompleted, filters.isCompleted));
    }

    const rows = await this.db
      .select()
      .from(tasks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(tasks.dueDate), asc(tasks.id));

    return rows.map((row) => this.toTaskInfo(row));
  }

  /**
   * 获取任务详情
   */
  async getTaskById(taskId: number): Promise<TaskInfo> {
    return this.toTaskInfo(await this.findTask(taskId));
  }

  /**
   * 创建任务
   *
   * isRecurring 为 true 时会按 recurrenceType 一次性生成整个系列，返回第一个实例
   */
  async createTask(data: CreateTaskInput): Promise<TaskInfo> {
    const title = data.title.trim();
    if (!title) {
      throw validationError("title is required.", "title");
    }

    const dueDate = this.parseDueDate(data.dueDate);
    const startTime = this.parseOptionalTime(data.startTime, "start_time");
    const endTime = this.parseOptionalTime(data.endTime, "end_time");
    this.validateTimeRange(startTime, endTime);

    const base = {
      title,
      description: data.description ?? null,
      dueDate,
      startTime,
      endTime,
    };

    // 重复任务逻辑
    if (data.isRecurring) {
      return this.createRecurringTask(base, data);
    }

    // 一次性任务逻辑
    const result = await this.db
      .insert(tasks)
      .values({
        ...base,
        isRecurring: false,
        recurrenceType: "none",
        recurrenceGroupId: null,
      })
      .returning();

    const task = result[0];
    if (!task) {
      throw new Error("Failed to create task.");
    }
    return this.toTaskInfo(task);
  }

  /**
   * 创建重复任务：展开所有实例并共享同一个 recurrenceGroupId
   */
  private async createRecurringTask(
    base: Pick<TaskRow, "title" | "description" | "dueDate" | "startTime" | "endTime">,
    data: CreateTaskInput,
  ): Promise<TaskInfo> {
    const recurrenceType = data.recurrenceType;
    if (!isRepeatingType(recurrenceType)) {
      throw validationError(
        "Recurring tasks must use recurrence_type 'daily' or 'weekly'.",
        "recurrence_type",
      );
    }
    if (data.occurrences !== undefined && data.occurrences > MAX_OCCURRENCES) {
      throw validationError(
        `Recurring occurrences cannot exceed ${MAX_OCCURRENCES}.`,
        "occurrences",
      );
    }

    const recurrenceGroupId = randomUUID();
    const series = expandOccurrences(base, recurrenceType, data.occurrences);

    // 单条 INSERT：整个系列要么全部写入，要么都不写入
    const rows = await this.db
      .insert(tasks)
      .values(
        series.map((occurrence) => ({
          title: base.title,
          description: base.description,
          dueDate: occurrence.dueDate,
          startTime: occurrence.startTime,
          endTime: occurrence.endTime,
          isRecurring: true,
          recurrenceType,
          recurrenceGroupId,
        })),
      )
      .returning();

    const first = rows.find((row) => row.dueDate === base.dueDate);
    if (!first) {
      throw new Error("Failed to create recurring task.");
    }
    return this.toTaskInfo(first);
  }

  /**
   * 更新任务内容（部分更新）
   *
   * scope 为 all_future 时，title/description 的修改同时应用到同系列中
   * due_date 不早于当前任务的其他实例
   */
  async updateTask(
    taskId: number,
    data: UpdateTaskInput,
    scope: ChangeScope = "single",
  ): Promise<TaskInfo> {
    const task = await this.findTask(taskId);

    const updateData: Partial<typeof tasks.$inferInsert> = {};
    if (data.title !== undefined) {
      const title = data.title.trim();
      if (!title) {
        throw validationError("title cannot be empty.", "title");
      }
      updateData.title = title;
    }
    if (data.description !== undefined) {
      updateData.description = data.description ?? null;
    }
    if (data.isCompleted !== undefined) {
      updateData.isCompleted = data.isCompleted;
    }
    if (data.timeTrackedSeconds !== undefined) {
      if (!Number.isInteger(data.timeTrackedSeconds) || data.timeTrackedSeconds < 0) {
        throw validationError(
          "time_tracked_seconds must be a non-negative integer.",
          "time_tracked_seconds",
        );
      }
      updateData.timeTrackedSeconds = data.timeTrackedSeconds;
    }
    if (data.dueDate !== undefined) {
      updateData.dueDate = this.parseDueDate(data.dueDate);
    }
    if (data.startTime !== undefined) {
      updateData.startTime = this.parseOptionalTime(data.startTime, "start_time");
    }
    if (data.endTime !== undefined) {
      updateData.endTime = this.parseOptionalTime(data.endTime, "end_time");
    }

    this.validateTimeRange(
      updateData.startTime !== undefined ? updateData.startTime : task.startTime,
      updateData.endTime !== undefined ? updateData.endTime : task.endTime,
    );

    if (Object.keys(updateData).length > 0) {
      await this.db.update(tasks).set(updateData).where(eq(tasks.id, taskId));
    }

    if (scope === "all_future" && task.recurrenceGroupId) {
      const seriesData: Partial<typeof tasks.$inferInsert> = {};
      if (updateData.title !== undefined) seriesData.title = updateData.title;
      if (updateData.description !== undefined) seriesData.description = updateData.description;

      if (Object.keys(seriesData).length > 0) {
        await this.db
          .update(tasks)
          .set(seriesData)
          .where(
            and(
              eq(tasks.recurrenceGroupId, task.recurrenceGroupId),
              gte(tasks.dueDate, task.dueDate),
              ne(tasks.id, taskId),
            ),
          );
      }
    }

    return this.getTaskById(taskId);
  }

  /**
   * 删除任务
   *
   * scope 为 all_future 且任务属于重复系列时，删除同系列中 due_date
   * 不早于当前任务的所有实例；非重复任务忽略 scope
   *
   * @returns 删除的任务数
   */
  async deleteTask(taskId: number, scope: ChangeScope = "single"): Promise<number> {
    const task = await this.findTask(taskId);

    if (scope === "all_future" && task.recurrenceGroupId) {
      const deleted = await this.db
        .delete(tasks)
        .where(
          and(
            eq(tasks.recurrenceGroupId, task.recurrenceGroupId),
            gte(tasks.dueDate, task.dueDate),
          ),
        )
        .returning({ id: tasks.id });
      return deleted.length;
    }

    const deleted = await this.db
      .delete(tasks)
      .where(eq(tasks.id, taskId))
      .returning({ id: tasks.id });
    return deleted.length;
  }
}
