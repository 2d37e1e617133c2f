import { Hono } from "hono";
import { z } from "zod";
import type { AppVariables } from "../types/variables";
import { TaskService } from "../services/task.service";
import {
  dateField,
  dateTimeField,
  errorResponse,
  parseIdParam,
  scopeQuerySchema,
  successResponse,
  validate,
} from "../utils/route-helpers";
import { ErrorCode, handleServiceError } from "../utils/error-handler";
import { MAX_OCCURRENCES } from "../utils/recurrence";

const tasksRoutes = new Hono<{
  Variables: AppVariables;
}>();

// 创建任务的Zod Schema
const createTaskSchema = z.object({
  title: z.string().trim().min(1).max(100),
  description: z.string().nullable().optional(),
  due_date: dateField,
  start_time: dateTimeField.nullable().optional(),
  end_time: dateTimeField.nullable().optional(),
  is_recurring: z.boolean().optional(),
  recurrence_type: z.enum(["none", "daily", "weekly"]).optional(),
  occurrences: z.number().int().max(MAX_OCCURRENCES).optional(),
});

// 更新任务的Zod Schema（所有字段可选）
const updateTaskSchema = z.object({
  title: z.string().trim().min(1).max(100).optional(),
  description: z.string().nullable().optional(),
  is_completed: z.boolean().optional(),
  time_tracked_seconds: z.number().int().min(0).optional(),
  due_date: dateField.optional(),
  start_time: dateTimeField.nullable().optional(),
  end_time: dateTimeField.nullable().optional(),
});

// 任务列表筛选参数
const listTasksQuerySchema = z.object({
  recurrence_group_id: z.string().optional(),
  due_from: dateField.optional(),
  due_to: dateField.optional(),
  is_completed: z.enum(["true", "false"]).optional(),
});

const invalidId = () => errorResponse("Invalid task ID", ErrorCode.VALIDATION_ERROR);

/**
 * GET /tasks
 * 获取任务列表
 */
tasksRoutes.get("/", validate("query", listTasksQuerySchema), async (c) => {
  try {
    const db = c.get("db");
    const query = c.req.valid("query");

    const taskService = new TaskService(db);
    const result = await taskService.getTasks({
      recurrenceGroupId: query.recurrence_group_id,
      dueFrom: query.due_from,
      dueTo: query.due_to,
      isCompleted: query.is_completed === undefined ? undefined : query.is_completed === "true",
    });

    return c.json(successResponse(result));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * GET /tasks/:id
 * 获取任务详情
 */
tasksRoutes.get("/:id", async (c) => {
  try {
    const taskId = parseIdParam(c.req.param("id"));
    if (taskId === null) {
      return c.json(invalidId(), 400);
    }

    const taskService = new TaskService(c.get("db"));
    const task = await taskService.getTaskById(taskId);

    return c.json(successResponse(task));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * POST /tasks
 * 创建任务（重复任务会一次性生成整个系列）
 */
tasksRoutes.post("/", validate("json", createTaskSchema), async (c) => {
  try {
    const db = c.get("db");
    const data = c.req.valid("json");

    const taskService = new TaskService(db);
    const task = await taskService.createTask({
      title: data.title,
      description: data.description,
      dueDate: data.due_date,
      startTime: data.start_time,
      endTime: data.end_time,
      isRecurring: data.is_recurring ?? false,
      recurrenceType: data.recurrence_type,
      occurrences: data.occurrences,
    });

    return c.json(successResponse(task), 201);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * PUT /tasks/:id?apply_to=single|all_future
 * 更新任务内容
 */
tasksRoutes.put(
  "/:id",
  validate("query", scopeQuerySchema),
  validate("json", updateTaskSchema),
  async (c) => {
    try {
      const taskId = parseIdParam(c.req.param("id"));
      if (taskId === null) {
        return c.json(invalidId(), 400);
      }

      const data = c.req.valid("json");
      const { apply_to } = c.req.valid("query");

      const taskService = new TaskService(c.get("db"));
      const task = await taskService.updateTask(
        taskId,
        {
          title: data.title,
          description: data.description,
          isCompleted: data.is_completed,
          timeTrackedSeconds: data.time_tracked_seconds,
          dueDate: data.due_date,
          startTime: data.start_time,
          endTime: data.end_time,
        },
        apply_to ?? "single",
      );

      return c.json(successResponse(task));
    } catch (error) {
      return handleServiceError(c, error);
    }
  },
);

/**
 * DELETE /tasks/:id?apply_to=single|all_future
 * 删除任务；all_future 删除同系列中当前及之后的所有实例
 */
tasksRoutes.delete("/:id", validate("query", scopeQuerySchema), async (c) => {
  try {
    const taskId = parseIdParam(c.req.param("id"));
    if (taskId === null) {
      return c.json(invalidId(), 400);
    }

    const { apply_to } = c.req.valid("query");

    const taskService = new TaskService(c.get("db"));
    await taskService.deleteTask(taskId, apply_to ?? "single");

    return c.body(null, 204);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

export default tasksRoutes;
