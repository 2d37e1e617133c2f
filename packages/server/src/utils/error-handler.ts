import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import type { ApiErrorResponse, FieldError } from "@planner/shared";

/**
 * 标准错误码
 */
export enum ErrorCode {
  BAD_REQUEST = "BAD_REQUEST",
  NOT_FOUND = "NOT_FOUND",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export type ErrorStatusCode = 400 | 404 | 500;

/**
 * 自定义应用错误类
 */
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: ErrorStatusCode = 500,
    public details?: FieldError[],
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * 格式化Zod验证错误
 */
export function formatZodError(error: ZodError): FieldError[] {
  return error.issues.map((err) => ({
    field: err.path.join("."),
    message: err.message,
  }));
}

/**
 * 处理服务层错误
 *
 * 根据错误类型返回适当的 HTTP 状态码和错误消息；
 * 只有未预期的错误会被记录日志
 *
 * @param c - Hono Context
 * @param error - 错误对象
 * @param defaultMessage - 未知错误时返回给客户端的消息
 */
export function handleServiceError(
  c: Context,
  error: unknown,
  defaultMessage: string = "Internal server error",
) {
  // Zod验证错误
  if (error instanceof ZodError) {
    return c.json(
      {
        success: false,
        error: "Validation failed",
        code: ErrorCode.VALIDATION_ERROR,
        details: formatZodError(error),
      } satisfies ApiErrorResponse,
      400,
    );
  }

  // 自定义应用错误
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error("Service error:", error);
    }
    return c.json(
      {
        success: false,
        error: error.message,
        code: error.code,
        details: error.details,
      } satisfies ApiErrorResponse,
      error.statusCode,
    );
  }

  // Hono 抛出的 HTTP 异常（如请求体不是合法 JSON）
  if (error instanceof HTTPException) {
    return c.json(
      {
        success: false,
        error: error.message,
        code: error.status === 404 ? ErrorCode.NOT_FOUND : ErrorCode.BAD_REQUEST,
      } satisfies ApiErrorResponse,
      error.status,
    );
  }

  console.error("Service error:", error);
  return c.json(
    {
      success: false,
      error: defaultMessage,
      code: ErrorCode.INTERNAL_ERROR,
    },
    500,
  );
}

/**
 * 创建标准错误对象
 */
export function createError(
  code: ErrorCode,
  message: string,
  statusCode: ErrorStatusCode = 500,
  details?: FieldError[],
): AppError {
  return new AppError(code, message, statusCode, details);
}

/**
 * 资源不存在
 */
export function notFound(resource: string): AppError {
  return createError(ErrorCode.NOT_FOUND, `${resource} not found.`, 404);
}

/**
 * 业务校验失败
 */
export function validationError(message: string, field?: string): AppError {
  return createError(
    ErrorCode.VALIDATION_ERROR,
    message,
    400,
    field ? [{ field, message }] : undefined,
  );
}
