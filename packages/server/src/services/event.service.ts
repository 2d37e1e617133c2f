import { and, asc, eq, gte, lte } from "drizzle-orm";
import type { DbInstance } from "../db/db";
import { events } from "../db/schema";
import { parseDateTime, toUtcIso } from "../utils/time";
import { notFound, validationError } from "../utils/error-handler";
import type { CreateEventInput, UpdateEventInput, EventFilters, EventInfo } from "@planner/shared";

type EventRow = typeof events.$inferSelect;

/**
 * 日程Service层
 */
export class EventService {
  constructor(private db: DbInstance) {}

  private toEventInfo(event: EventRow): EventInfo {
    return {
      id: event.id,
      title: event.title,
      description: event.description,
      start_time: toUtcIso(event.startTime),
      end_time: toUtcIso(event.endTime),
      created_at: toUtcIso(event.createdAt),
    };
  }

  private async findEvent(eventId: number): Promise<EventRow> {
    const event = await this.db.query.events.findFirst({
      where: eq(events.id, eventId),
    });

    if (!event) {
      throw notFound("Event");
    }
    return event;
  }

  private parseTime(value: string, field: string): Date {
    const parsed = parseDateTime(value);
    if (!parsed) {
      throw validationError(`${field} must be an ISO 8601 datetime.`, field);
    }
    return parsed;
  }

  private validateTimeRange(startTime: Date, endTime: Date | null) {
    if (endTime && endTime < startTime) {
      throw validationError("end_time cannot be before start_time.", "end_time");
    }
  }

  /**
   * 获取日程列表，按开始时间升序；from/to 按 start_time 过滤（含边界）
   */
  async getEvents(filters: EventFilters = {}): Promise<EventInfo[]> {
    const conditions = [];

    if (filters.from) {
      conditions.push(gte(events.startTime, this.parseTime(filters.from, "from")));
    }
    if (filters.to) {
      conditions.push(lte(events.startTime, this.parseTime(filters.to, "to")));
    }

    const rows = await this.db
      .select()
      .from(events)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(events.startTime), asc(events.id));

    return rows.map((row) => this.toEventInfo(row));
  }

  /**
   * 获取日程详情
   */
  async getEventById(eventId: number): Promise<EventInfo> {
    return this.toEventInfo(await this.findEvent(eventId));
  }

  /**
   * 创建日程
   */
  async createEvent(data: CreateEventInput): Promise<EventInfo> {
    const title = data.title.trim();
    if (!title) {
      throw validationError("title is required.", "title");
    }

    const startTime = this.parseTime(data.startTime, "start_time");
    const endTime = data.endTime ? this.parseTime(data.endTime, "end_time") : null;
    this.validateTimeRange(startTime, endTime);

    const result = await this.db
      .insert(events)
      .values({
        title,
        description: data.description ?? null,
        startTime,
        endTime,
      })
      .returning();

    const event = result[0];
    if (!event) {
      throw new Error("Failed to create event.");
    }
    return this.toEventInfo(event);
  }

  /**
   * 更新日程（部分更新）
   *
   * start_time 不能置空；end_time 显式传 null 时清空
   */
  async updateEvent(eventId: number, data: UpdateEventInput): Promise<EventInfo> {
    const event = await this.findEvent(eventId);

    const updateData: Partial<typeof events.$inferInsert> = {};
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
    if (data.startTime !== undefined) {
      updateData.startTime = this.parseTime(data.startTime, "start_time");
    }
    if (data.endTime !== undefined) {
      updateData.endTime = data.endTime ? this.parseTime(data.endTime, "end_time") : null;
    }

    this.validateTimeRange(
      updateData.startTime ?? event.startTime,
      updateData.endTime !== undefined ? updateData.endTime : event.endTime,
    );

    if (Object.keys(updateData).length > 0) {
      await this.db.update(events).set(updateData).where(eq(events.id, eventId));
    }

    return this.getEventById(eventId);
  }

  /**
   * 删除日程
   */
  async deleteEvent(eventId: number): Promise<void> {
    await this.findEvent(eventId);
    await this.db.delete(events).where(eq(events.id, eventId));
  }
}
