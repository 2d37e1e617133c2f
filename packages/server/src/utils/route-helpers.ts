import { zValidator } from "@hono/zod-validator";
import type { ValidationTargets } from "hono";
import { z, type ZodSchema } from "zod";
import type { ApiErrorResponse } from "@planner/shared";
import { ErrorCode, formatZodError } from "./error-handler";
import { parseDateTime, toDateOnly } from "./time";

/**
 * 格式化成功响应
 *
 * 统一的成功响应格式：{ success: true, data: {...} }
 */
export function successResponse<T>(data: T) {
  return {
    success: true as const,
    data,
  };
}

/**
 * 格式化错误响应
 *
 * 统一的错误响应格式：{ success: false, error: "...", code }
 */
export function errorResponse(message: string, code: ErrorCode = ErrorCode.BAD_REQUEST) {
  return {
    success: false as const,
    error: message,
    code,
  };
}

/**
 * 解析路径中的 ID，只接受正整数
 *
 * @returns ID，非法时返回 null
 */
export function parseIdParam(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * zValidator 包装：校验失败时返回统一的错误响应格式
 *
 * @example
 * tasksRoutes.post("/", validate("json", createTaskSchema), async (c) => {
 *   const data = c.req.valid("json");
 * });
 */
export const validate = <T extends ZodSchema, Target extends keyof ValidationTargets>(
  target: Target,
  schema: T,
) =>
  zValidator(target, schema, (result, c) => {
    if (!result.success) {
      return c.json(
        {
          success: false,
          error: "Validation failed",
          code: ErrorCode.VALIDATION_ERROR,
          details: formatZodError(result.error),
        } satisfies ApiErrorResponse,
        400,
      );
    }
  });

/**
 * 日期字段：YYYY-MM-DD 或 ISO 8601 日期时间
 */
export const dateField = z
  .string()
  .refine((value) => toDateOnly(value) !== null, {
    message: "Expected a YYYY-MM-DD date or ISO 8601 datetime",
  });

/**
 * 日期时间字段：ISO 8601，无时区信息时按 UTC
 */
export const dateTimeField = z
  .string()
  .refine((value) => parseDateTime(value) !== null, {
    message: "Expected an ISO 8601 datetime",
  });

/**
 * 修改/删除重复任务时的作用范围
 */
export const scopeQuerySchema = z.object({
  apply_to: z.enum(["single", "all_future"]).optional(),
});
