/**
 * 日志工具
 *
 * 开发环境: 显示所有日志
 * 生产/测试环境: 只显示警告和错误
 */

/**
 * 检测是否为开发环境
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development"
}

/**
 * 日志工具类
 */
export class Logger {
  private readonly isDev: boolean
  private readonly tag: string

  constructor(tag: string = "") {
    this.isDev = isDevelopment()
    this.tag = tag
  }

  /**
   * 格式化日志消息（添加标签前缀）
   */
  private formatMessage(message: string): string {
    if (this.tag) {
      return `[${this.tag}] ${message}`
    }
    return message
  }

  /**
   * 调试日志（仅开发环境）
   */
  debug(message: string, data?: unknown): void {
    if (this.isDev) {
      console.log(this.formatMessage(message), data ?? "")
    }
  }

  /**
   * 信息日志（仅开发环境）
   */
  info(message: string, data?: unknown): void {
    if (this.isDev) {
      console.log(this.formatMessage(message), data ?? "")
    }
  }

  /**
   * 警告日志（总是显示）
   */
  warn(message: string, data?: unknown): void {
    console.warn(this.formatMessage(message), data ?? "")
  }

  /**
   * 错误日志（总是显示）
   */
  error(message: string, error?: unknown): void {
    console.error(this.formatMessage(message), error ?? "")
  }

  /**
   * 创建带特定标签的 logger 实例
   *
   * @example
   * const analyzerLogger = logger.withTag('ContentAnalyzer')
   * analyzerLogger.warn('摘要生成失败')  // 输出: [ContentAnalyzer] 摘要生成失败
   */
  withTag(tag: string): Logger {
    return new Logger(tag)
  }
}

/**
 * 导出单例
 */
export const logger = new Logger()
