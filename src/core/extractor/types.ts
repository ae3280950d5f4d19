/**
 * 网页正文提取类型定义
 */

/**
 * 网页内容
 */
export interface PageContent {
  /** 页面标题 */
  title: string
  /** 页面描述 */
  description: string
  /** 正文内容，段落之间以换行分隔 */
  content: string
  /** 元数据关键词 */
  metaKeywords: string[]
}

/**
 * 提取配置
 */
export interface ExtractorConfig {
  /** 最大内容长度 */
  maxContentLength: number
  /** 回退到逐段提取时，段落的最小长度 */
  minParagraphLength: number
  /** 未找到标题时使用的标题 */
  defaultTitle: string
}

/**
 * 从 HTML 提取正文的结果
 */
export type PageExtraction =
  | {
      success: true
      title: string
      content: string
      url?: string
      wordCount: number
    }
  | {
      success: false
      error: string
    }
