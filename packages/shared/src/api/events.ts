// 创建日程输入类型
export interface CreateEventInput {
  title: string;
  description?: string | null;
  startTime: string;
  endTime?: string | null;
}

// 更新日程输入类型
export interface UpdateEventInput {
  title?: string;
  description?: string | null;
  startTime?: string;
  endTime?: string | null;
}

// 日程筛选器类型（按 start_time 过滤）
export interface EventFilters {
  from?: string;
  to?: string;
}

// 日程信息类型
export interface EventInfo {
  id: number;
  title: string;
  description: string | null;
  start_time: string;
  end_time: string | null;
  created_at: string;
}
