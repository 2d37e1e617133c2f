import { desc, eq } from "drizzle-orm";
import type { DbInstance } from "../db/db";
import { journalEntries } from "../db/schema";
import { parseDateTime, toUtcIso } from "../utils/time";
import { notFound, validationError } from "../utils/error-handler";
import type {
  CreateJournalEntryInput,
  UpdateJournalEntryInput,
  JournalContent,
  JournalFilters,
  JournalEntryInfo,
} from "@planner/shared";

type JournalEntryRow = typeof journalEntries.$inferSelect;

/**
 * 日志Service层（饮食、睡眠、心情等记录）
 */
export class JournalService {
  constructor(private db: DbInstance) {}

  private toEntryInfo(entry: JournalEntryRow): JournalEntryInfo {
    return {
      id: entry.id,
      entry_type: entry.entryType,
      content: entry.content,
      timestamp: toUtcIso(entry.timestamp),
    };
  }

  private async findEntry(entryId: number): Promise<JournalEntryRow> {
    const entry = await this.db.query.journalEntries.findFirst({
      where: eq(journalEntries.id, entryId),
    });

    if (!entry) {
      throw notFound("Journal entry");
    }
    return entry;
  }

  private parseTimestamp(value: string): Date {
    const parsed = parseDateTime(value);
    if (!parsed) {
      throw validationError("timestamp must be an ISO 8601 datetime.", "timestamp");
    }
    return parsed;
  }

  private normalizeEntryType(value: string): string {
    const entryType = value.trim();
    if (!entryType) {
      throw validationError("entry_type is required.", "entry_type");
    }
    return entryType;
  }

  private validateContent(content: JournalContent) {
    if (Object.keys(content).length === 0) {
      throw validationError("content cannot be empty.", "content");
    }
  }

  /**
   * 获取日志列表，最新的在前
   */
  async getEntries(filters: JournalFilters = {}): Promise<JournalEntryInfo[]> {
    const rows = await this.db
      .select()
      .from(journalEntries)
      .where(filters.entryType ? eq(journalEntries.entryType, filters.entryType) : undefined)
      .orderBy(desc(journalEntries.timestamp), desc(journalEntries.id));

    return rows.map((row) => this.toEntryInfo(row));
  }

  /**
   * 获取日志详情
   */
  async getEntryById(entryId: number): Promise<JournalEntryInfo> {
    return this.toEntryInfo(await this.findEntry(entryId));
  }

  /**
   * 创建日志，未提供 timestamp 时使用当前时间
   */
  async createEntry(data: CreateJournalEntryInput): Promise<JournalEntryInfo> {
    const entryType = this.normalizeEntryType(data.entryType);
    this.validateContent(data.content);

    const result = await this.db
      .insert(journalEntries)
      .values({
        entryType,
        content: data.content,
        timestamp: data.timestamp ? this.parseTimestamp(data.timestamp) : new Date(),
      })
      .returning();

    const entry = result[0];
    if (!entry) {
      throw new Error("Failed to create journal entry.");
    }
    return this.toEntryInfo(entry);
  }

  /**
   * 更新日志（部分更新）
   */
  async updateEntry(entryId: number, data: UpdateJournalEntryInput): Promise<JournalEntryInfo> {
    await this.findEntry(entryId);

    const updateData: Partial<typeof journalEntries.$inferInsert> = {};
    if (data.entryType !== undefined) {
      updateData.entryType = this.normalizeEntryType(data.entryType);
    }
    if (data.content !== undefined) {
      this.validateContent(data.content);
      updateData.content = data.content;
    }
    if (data.timestamp !== undefined) {
      updateData.timestamp = this.parseTimestamp(data.timestamp);
    }

    if (Object.keys(updateData).length > 0) {
      await this.db
        .update(journalEntries)
        .set(updateData)
        .where(eq(journalEntries.id, entryId));
    }

    return this.getEntryById(entryId);
  }

  /**
   * 删除日志
   */
  async deleteEntry(entryId: number): Promise<void> {
    await this.findEntry(entryId);
    await this.db.delete(journalEntries).where(eq(journalEntries.id, entryId));
  }
}
