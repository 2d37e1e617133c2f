import type { JournalContent } from "../types/common";

// 创建日志输入类型
export interface CreateJournalEntryInput {
  entryType: string;
  content: JournalContent;
  timestamp?: string | null;
}

// 更新日志输入类型
export interface UpdateJournalEntryInput {
  entryType?: string;
  content?: JournalContent;
  timestamp?: string;
}

// 日志筛选器类型
export interface JournalFilters {
  entryType?: string;
}

// 日志信息类型
export interface JournalEntryInfo {
  id: number;
  entry_type: string;
  content: JournalContent;
  timestamp: string;
}
