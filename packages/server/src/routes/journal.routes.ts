import { Hono } from "hono";
import { z } from "zod";
import type { AppVariables } from "../types/variables";
import { JournalService } from "../services/journal.service";
import {
  dateTimeField,
  errorResponse,
  parseIdParam,
  successResponse,
  validate,
} from "../utils/route-helpers";
import { ErrorCode, handleServiceError } from "../utils/error-handler";

const journalRoutes = new Hono<{
  Variables: AppVariables;
}>();

// 日志内容：非空的键值对象
const contentSchema = z
  .record(z.string(), z.unknown())
  .refine((content) => Object.keys(content).length > 0, { message: "content cannot be empty" });

// 创建日志的Zod Schema
const createEntrySchema = z.object({
  entry_type: z.string().trim().min(1).max(50),
  content: contentSchema,
  timestamp: dateTimeField.nullable().optional(),
});

// 更新日志的Zod Schema：timestamp 为必填列，不能置空
const updateEntrySchema = z.object({
  entry_type: z.string().trim().min(1).max(50).optional(),
  content: contentSchema.optional(),
  timestamp: dateTimeField.optional(),
});

const listEntriesQuerySchema = z.object({
  entry_type: z.string().optional(),
});

const invalidId = () => errorResponse("Invalid journal entry ID", ErrorCode.VALIDATION_ERROR);

/**
 * GET /journal
 * 获取日志列表（最新的在前）
 */
journalRoutes.get("/", validate("query", listEntriesQuerySchema), async (c) => {
  try {
    const { entry_type } = c.req.valid("query");

    const journalService = new JournalService(c.get("db"));
    const result = await journalService.getEntries({ entryType: entry_type });

    return c.json(successResponse(result));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * GET /journal/:id
 * 获取日志详情
 */
journalRoutes.get("/:id", async (c) => {
  try {
    const entryId = parseIdParam(c.req.param("id"));
    if (entryId === null) {
      return c.json(invalidId(), 400);
    }

    const journalService = new JournalService(c.get("db"));
    const entry = await journalService.getEntryById(entryId);

    return c.json(successResponse(entry));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * POST /journal
 * 创建日志
 */
journalRoutes.post("/", validate("json", createEntrySchema), async (c) => {
  try {
    const data = c.req.valid("json");

    const journalService = new JournalService(c.get("db"));
    const entry = await journalService.createEntry({
      entryType: data.entry_type,
      content: data.content,
      timestamp: data.timestamp,
    });

    return c.json(successResponse(entry), 201);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * PUT /journal/:id
 * 更新日志
 */
journalRoutes.put("/:id", validate("json", updateEntrySchema), async (c) => {
  try {
    const entryId = parseIdParam(c.req.param("id"));
    if (entryId === null) {
      return c.json(invalidId(), 400);
    }

    const data = c.req.valid("json");

    const journalService = new JournalService(c.get("db"));
    const entry = await journalService.updateEntry(entryId, {
      entryType: data.entry_type,
      content: data.content,
      timestamp: data.timestamp,
    });

    return c.json(successResponse(entry));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * DELETE /journal/:id
 * 删除日志
 */
journalRoutes.delete("/:id", async (c) => {
  try {
    const entryId = parseIdParam(c.req.param("id"));
    if (entryId === null) {
      return c.json(invalidId(), 400);
    }

    const journalService = new JournalService(c.get("db"));
    await journalService.deleteEntry(entryId);

    return c.body(null, 204);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

export default journalRoutes;
