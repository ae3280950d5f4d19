/**
 * 网页正文提取器
 *
 * 从 HTML 中提取可供分析的纯文本：
 * - 元数据（title, description, keywords）
 * - 正文内容（优先 article/main 标签，排除导航、页脚等样板内容）
 *
 * 只处理已经取回的 HTML，不发起网络请求
 */

import { JSDOM } from "jsdom"

import { countWords } from "@/core/analyzer/statistics"
import { ErrorCode, handleSync } from "@/utils/errors"
import { logger } from "@/utils/logger"

import type { ExtractorConfig, PageContent, PageExtraction } from "./types"

const extractorLogger = logger.withTag("ContentExtractor")

/**
 * 默认配置
 */
const DEFAULT_CONFIG: ExtractorConfig = {
  maxContentLength: 50000,
  minParagraphLength: 50,
  defaultTitle: "Untitled",
}

/** 样板区域 */
const BOILERPLATE_SELECTOR = "nav, aside, footer, header, script, style, noscript, form"

/** 正文中的块级文本元素 */
const BLOCK_SELECTOR = "p, li, h1, h2, h3, h4, h5, h6, blockquote, pre"

const CONTENT_SELECTORS = [
  ".article-content",
  ".post-content",
  ".entry-content",
  ".review-content",
  ".content",
  "#content",
  ".main-content",
]

/**
 * 校验 URL 格式（需要协议和主机）
 */
export function validateUrl(url: string): boolean {
  const result = handleSync(() => new URL(url), { logError: false })
  if (!result.ok) {
    return false
  }
  const { protocol, host } = result.value
  return (protocol === "http:" || protocol === "https:") && host.length > 0
}

/**
 * 正文提取器类
 */
export class ContentExtractor {
  private readonly config: ExtractorConfig

  constructor(config: Partial<ExtractorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  /**
   * 提取页面内容
   * @param doc 文档对象
   */
  extract(doc: Document): PageContent {
    return {
      title: this.extractTitle(doc),
      description: this.extractDescription(doc),
      content: this.extractMainContent(doc),
      metaKeywords: this.extractMetaKeywords(doc),
    }
  }

  /**
   * 解析 HTML 字符串并提取正文
   *
   * @param html 已取回的页面 HTML
   * @param url 页面地址（可选，仅校验格式并原样返回）
   */
  extractFromHtml(html: string, url?: string): PageExtraction {
    if (url !== undefined && !validateUrl(url)) {
      extractorLogger.warn("URL 格式无效", { url })
      return {
        success: false,
        error: "Invalid URL format. Please enter a valid URL starting with http:// or https://",
      }
    }

    const parsed = handleSync(() => this.extract(new JSDOM(html, { url }).window.document), {
      code: ErrorCode.EXTRACTION_ERROR,
      tag: "ContentExtractor",
      operation: "解析 HTML",
      context: { url },
    })

    if (!parsed.ok) {
      return { success: false, error: `Failed to extract content: ${parsed.error.message}` }
    }

    const { title, content } = parsed.value
    if (!content) {
      return { success: false, error: "No content could be extracted from the webpage" }
    }

    return {
      success: true,
      title: title || this.config.defaultTitle,
      content,
      url,
      wordCount: countWords(content),
    }
  }

  /**
   * 提取标题
   */
  private extractTitle(doc: Document): string {
    // 1. 优先使用 og:title
    const ogTitle = doc.querySelector('meta[property="og:title"]')?.getAttribute("content")
    if (ogTitle) return ogTitle.trim()

    // 2. 使用 document.title
    if (doc.title) {
      return doc.title.trim()
    }

    // 3. 使用第一个 h1
    return doc.querySelector("h1")?.textContent?.trim() ?? ""
  }

  /**
   * 提取描述
   */
  private extractDescription(doc: Document): string {
    const ogDesc = doc.querySelector('meta[property="og:description"]')?.getAttribute("content")
    if (ogDesc) return ogDesc.trim()

    const metaDesc = doc.querySelector('meta[name="description"]')?.getAttribute("content")
    if (metaDesc) return metaDesc.trim()

    const firstP = doc.querySelector("article p, main p, p")
    return (firstP?.textContent?.trim() ?? "").slice(0, 200)
  }

  /**
   * 提取元数据关键词
   */
  private extractMetaKeywords(doc: Document): string[] {
    const content = doc.querySelector('meta[name="keywords"]')?.getAttribute("content")
    if (!content) return []

    return content
      .split(",")
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  }

  /**
   * 提取正文内容
   *
   * 策略：
   * 1. <article> 标签
   * 2. <main> 标签
   * 3. 常见的内容类名
   * 4. 回退：样板区域之外的长段落
   */
  private extractMainContent(doc: Document): string {
    const container =
      doc.querySelector("article") ??
      doc.querySelector("main") ??
      CONTENT_SELECTORS.map((selector) => doc.querySelector(selector)).find((el) => el !== null)

    if (container) {
      return this.limit(this.blockTexts(container).join("\n"))
    }

    const paragraphs = Array.from(doc.querySelectorAll("p"))
      .filter((p) => !p.closest(BOILERPLATE_SELECTOR))
      .map((p) => cleanText(p.textContent ?? ""))
      .filter((text) => text.length > this.config.minParagraphLength)

    return this.limit(paragraphs.join("\n"))
  }

  /**
   * 容器内各块级元素的文本；没有块级元素时使用容器全文
   */
  private blockTexts(container: Element): string[] {
    const blocks = Array.from(container.querySelectorAll(BLOCK_SELECTOR))
      .filter((el) => !el.closest(BOILERPLATE_SELECTOR))
      // 嵌套的块（如 li 中的 p）只保留最外层
      .filter((el) => {
        const outer = el.parentElement?.closest(BLOCK_SELECTOR)
        return !outer || !container.contains(outer)
      })
      .map((el) => cleanText(el.textContent ?? ""))
      .filter((text) => text.length > 0)

    if (blocks.length > 0) {
      return blocks
    }

    const text = cleanText(container.textContent ?? "")
    return text ? [text] : []
  }

  private limit(text: string): string {
    return text.length > this.config.maxContentLength
      ? text.slice(0, this.config.maxContentLength)
      : text
  }
}

/**
 * 合并空白
 */
function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

/**
 * 默认导出实例
 */
export const contentExtractor = new ContentExtractor()
