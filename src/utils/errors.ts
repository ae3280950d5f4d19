/**
 * 统一错误处理模块
 *
 * 提供：
 * 1. AppError 类 - 结构化的应用错误
 * 2. handleSync - 同步操作错误处理包装器（分析流水线的阶段边界）
 * 3. 错误转换工具
 */

import { logger } from "./logger"

const errorLogger = logger.withTag("ErrorHandler")

/**
 * 错误码枚举
 */
export enum ErrorCode {
  // 通用错误
  UNKNOWN = "UNKNOWN",
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // 分析流水线
  EMPTY_CONTENT = "EMPTY_CONTENT",
  TOKENIZE_ERROR = "TOKENIZE_ERROR",
  READABILITY_ERROR = "READABILITY_ERROR",
  SENTIMENT_ERROR = "SENTIMENT_ERROR",
  SUMMARY_ERROR = "SUMMARY_ERROR",
  CHART_RENDER_ERROR = "CHART_RENDER_ERROR",

  // 网页正文提取
  EXTRACTION_ERROR = "EXTRACTION_ERROR",
  INVALID_URL = "INVALID_URL",

  // 存储记录
  RECORD_PARSE_ERROR = "RECORD_PARSE_ERROR",
}

/**
 * 应用错误类
 *
 * 扩展原生 Error，添加错误码、上下文信息等结构化数据
 *
 * @example
 * ```typescript
 * throw new AppError(
 *   'Readability requires at least one word',
 *   ErrorCode.READABILITY_ERROR,
 *   { sentenceCount: 0 }
 * )
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode

  /**
   * 上下文信息
   */
  public readonly context?: Record<string, unknown>

  public readonly timestamp: Date

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    // 原始错误通过标准的 Error.cause 保留
    super(message, cause ? { cause } : undefined)
    this.name = "AppError"
    this.code = code
    this.context = context
    this.timestamp = new Date()

    // 保持正确的原型链
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * 将错误转换为 JSON 格式（用于日志记录）
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack
      } : undefined
    }
  }
}

/**
 * 内容为空（整个分析中止的唯一输入条件）
 */
export class EmptyContentError extends AppError {
  constructor(message: string = "No content provided for analysis") {
    super(message, ErrorCode.EMPTY_CONTENT)
    this.name = "EmptyContentError"
  }
}

/**
 * 将任意错误转换为 AppError
 *
 * 已经是 AppError 的保持原错误码；其他错误使用传入的错误码
 */
export function toAppError(
  error: unknown,
  code?: ErrorCode,
  context?: Record<string, unknown>
): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      code ?? ErrorCode.UNKNOWN,
      context,
      error
    )
  }

  return new AppError(
    String(error),
    code ?? ErrorCode.UNKNOWN,
    context
  )
}

/**
 * 同步操作错误处理选项
 */
export interface HandleSyncOptions {
  /**
   * 错误码
   */
  code?: ErrorCode

  /**
   * 上下文信息
   */
  context?: Record<string, unknown>

  /**
   * 是否记录错误日志（默认 true）
   */
  logError?: boolean

  /**
   * 日志标签（默认使用 ErrorHandler）
   */
  tag?: string

  /**
   * 错误发生时的回调
   */
  onError?: (error: AppError) => void

  /**
   * 操作描述（用于日志）
   */
  operation?: string
}

/**
 * 操作结果
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: AppError }

/**
 * 同步操作错误处理包装器
 *
 * @example
 * ```typescript
 * const result = handleSync(
 *   () => JSON.parse(raw),
 *   { operation: '解析关键词', code: ErrorCode.RECORD_PARSE_ERROR }
 * )
 *
 * if (!result.ok) {
 *   return []
 * }
 * ```
 */
export function handleSync<T>(
  fn: () => T,
  options: HandleSyncOptions = {}
): Result<T> {
  const {
    code,
    context,
    logError: shouldLog = true,
    tag,
    onError,
    operation
  } = options

  try {
    return { ok: true, value: fn() }
  } catch (err) {
    const appError = toAppError(err, code, context)

    if (shouldLog) {
      const loggerInstance = tag ? logger.withTag(tag) : errorLogger
      const operationDesc = operation ? ` [${operation}]` : ""
      loggerInstance.error(`操作失败${operationDesc}`, appError.toJSON())
    }

    if (onError) {
      try {
        onError(appError)
      } catch (callbackError) {
        errorLogger.error("错误回调执行失败", callbackError)
      }
    }

    return { ok: false, error: appError }
  }
}
