// API响应类型定义

/**
 * 成功响应格式
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
}

/**
 * 字段级校验错误
 */
export interface FieldError {
  field: string;
  message: string;
}

/**
 * 错误响应格式
 */
export interface ApiErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: FieldError[];
}

