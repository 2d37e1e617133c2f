import { Hono } from "hono";
import { z } from "zod";
import type { AppVariables } from "../types/variables";
import { EventService } from "../services/event.service";
import {
  dateTimeField,
  errorResponse,
  parseIdParam,
  successResponse,
  validate,
} from "../utils/route-helpers";
import { ErrorCode, handleServiceError } from "../utils/error-handler";

const eventsRoutes = new Hono<{
  Variables: AppVariables;
}>();

// 创建日程的Zod Schema
const createEventSchema = z.object({
  title: z.string().trim().min(1).max(100),
  description: z.string().nullable().optional(),
  start_time: dateTimeField,
  end_time: dateTimeField.nullable().optional(),
});

// 更新日程的Zod Schema：start_time 为必填列，不能置空
const updateEventSchema = z.object({
  title: z.string().trim().min(1).max(100).optional(),
  description: z.string().nullable().optional(),
  start_time: dateTimeField.optional(),
  end_time: dateTimeField.nullable().optional(),
});

const listEventsQuerySchema = z.object({
  from: dateTimeField.optional(),
  to: dateTimeField.optional(),
});

const invalidId = () => errorResponse("Invalid event ID", ErrorCode.VALIDATION_ERROR);

/**
 * GET /events
 * 获取日程列表
 */
eventsRoutes.get("/", validate("query", listEventsQuerySchema), async (c) => {
  try {
    const { from, to } = c.req.valid("query");

    const eventService = new EventService(c.get("db"));
    const result = await eventService.getEvents({ from, to });

    return c.json(successResponse(result));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * GET /events/:id
 * 获取日程详情
 */
eventsRoutes.get("/:id", async (c) => {
  try {
    const eventId = parseIdParam(c.req.param("id"));
    if (eventId === null) {
      return c.json(invalidId(), 400);
    }

    const eventService = new EventService(c.get("db"));
    const event = await eventService.getEventById(eventId);

    return c.json(successResponse(event));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * POST /events
 * 创建日程
 */
eventsRoutes.post("/", validate("json", createEventSchema), async (c) => {
  try {
    const data = c.req.valid("json");

    const eventService = new EventService(c.get("db"));
    const event = await eventService.createEvent({
      title: data.title,
      description: data.description,
      startTime: data.start_time,
      endTime: data.end_time,
    });

    return c.json(successResponse(event), 201);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * PUT /events/:id
 * 更新日程
 */
eventsRoutes.put("/:id", validate("json", updateEventSchema), async (c) => {
  try {
    const eventId = parseIdParam(c.req.param("id"));
    if (eventId === null) {
      return c.json(invalidId(), 400);
    }

    const data = c.req.valid("json");

    const eventService = new EventService(c.get("db"));
    const event = await eventService.updateEvent(eventId, {
      title: data.title,
      description: data.description,
      startTime: data.start_time,
      endTime: data.end_time,
    });

    return c.json(successResponse(event));
  } catch (error) {
    return handleServiceError(c, error);
  }
});

/**
 * DELETE /events/:id
 * 删除日程
 */
eventsRoutes.delete("/:id", async (c) => {
  try {
    const eventId = parseIdParam(c.req.param("id"));
    if (eventId === null) {
      return c.json(invalidId(), 400);
    }

    const eventService = new EventService(c.get("db"));
    await eventService.deleteEvent(eventId);

    return c.body(null, 204);
  } catch (error) {
    return handleServiceError(c, error);
  }
});

export default eventsRoutes;
