import { ChartRenderer } from "@/core/charts/ChartRenderer"
import type {
  AnalysisFailure,
  AnalysisRequest,
  AnalysisResponse,
  AnalysisStage,
  ChartSet,
  StageFailure,
} from "@/types/analysis"
import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from "@/types/config"
import { EmptyContentError, ErrorCode, handleSync, toAppError } from "@/utils/errors"
import { logger } from "@/utils/logger"

import { KeywordExtractor } from "./KeywordExtractor"
import { sentimentConfidence, toSentimentReport, VaderSentimentScorer, type SentimentScorer } from "./SentimentScorer"
import { computeReadability, computeStatistics, READABILITY_FALLBACK } from "./statistics"
import { Summarizer } from "./Summarizer"
import { Tokenizer } from "./Tokenizer"

const analyzerLogger = logger.withTag("ContentAnalyzer")

/**
 * 可注入的分析依赖
 */
export interface ContentAnalyzerDeps {
  tokenizer?: Tokenizer
  sentimentScorer?: SentimentScorer
  keywordExtractor?: KeywordExtractor
  summarizer?: Summarizer
  chartRenderer?: ChartRenderer
}

/**
 * 内容分析器
 *
 * 把一段完整文本转换为统计、情感、关键词、摘要和图表。
 * 实例创建后只读（停用词表、情感词典、分词器），可在多个调用方之间共享
 *
 * 错误约定：
 * - 内容为空是唯一会中止整个分析的输入条件
 * - 可读性、摘要、图表在各自阶段内降级为默认值，并记录到 degraded
 * - analyze 不会抛出异常
 *
 * @example
 * ```typescript
 * const result = contentAnalyzer.analyze("I love this. It is okay. I hate this.")
 * if (result.success) {
 *   console.log(result.sentiment.label, result.keywords)
 * }
 * ```
 */
export class ContentAnalyzer {
  private readonly config: AnalyzerConfig
  private readonly tokenizer: Tokenizer
  private readonly sentimentScorer: SentimentScorer
  private readonly keywordExtractor: KeywordExtractor
  private readonly summarizer: Summarizer
  private readonly chartRenderer: ChartRenderer

  constructor(config: Partial<AnalyzerConfig> = {}, deps: ContentAnalyzerDeps = {}) {
    this.config = { ...DEFAULT_ANALYZER_CONFIG, ...config }
    this.tokenizer = deps.tokenizer ?? new Tokenizer()
    this.sentimentScorer = deps.sentimentScorer ?? new VaderSentimentScorer()
    this.keywordExtractor = deps.keywordExtractor ?? new KeywordExtractor(this.config.extraStopwords)
    this.summarizer = deps.summarizer ?? new Summarizer(this.config.summaryFallbackLength)
    this.chartRenderer = deps.chartRenderer ?? new ChartRenderer()
  }

  /**
   * 分析一段文本
   *
   * @param content 原文
   * @param title 标题，缺省为 "Untitled"
   */
  analyze(content: string | null | undefined, title?: string | null): AnalysisResponse {
    try {
      if (!content || content.trim() === "") {
        throw new EmptyContentError()
      }
      return this.run(content, title || this.config.defaultTitle)
    } catch (error) {
      const appError = toAppError(error)
      analyzerLogger.error("分析失败", appError.toJSON())
      return failure(appError.code, appError.message)
    }
  }

  analyzeRequest(request: AnalysisRequest): AnalysisResponse {
    return this.analyze(request.content, request.title)
  }

  private run(content: string, title: string): AnalysisResponse {
    const degraded: StageFailure[] = []
    const stage = <T>(name: AnalysisStage, code: ErrorCode, fn: () => T, fallback: () => T): T => {
      const result = handleSync(fn, {
        code,
        tag: "ContentAnalyzer",
        operation: name,
        context: { stage: name, contentLength: content.length },
      })
      if (result.ok) {
        return result.value
      }
      degraded.push({ stage: name, code: result.error.code, message: result.error.message })
      return fallback()
    }

    // 1. 分句、分词
    const sentences = this.tokenizer.sentences(content)
    const tokens = this.tokenizer.words(content)

    // 2. 基础统计与可读性
    const readability = stage(
      "readability",
      ErrorCode.READABILITY_ERROR,
      () => computeReadability(content, sentences.length),
      () => READABILITY_FALLBACK
    )
    const statistics = computeStatistics(content, sentences, readability)

    // 3. 情感
    const rawSentiment = this.sentimentScorer.polarityScores(content)

    // 4. 关键词
    const { topWords, keywords } = this.keywordExtractor.extract(tokens, this.config.topWordCount)

    // 5. 摘要
    const summary = stage(
      "summary",
      ErrorCode.SUMMARY_ERROR,
      () => this.summarizer.summarize(content, sentences),
      () => this.summarizer.fallback(content)
    )

    // 6. 图表（使用未取整的情感分数）
    let charts: ChartSet = {}
    if (this.config.renderCharts) {
      const outcome = this.chartRenderer.renderCharts(rawSentiment, topWords, this.config.chartWordCount)
      charts = outcome.charts
      degraded.push(...outcome.failures)
    }

    analyzerLogger.debug("分析完成", {
      title,
      wordCount: statistics.wordCount,
      degraded: degraded.map((entry) => entry.stage),
    })

    return {
      success: true,
      title,
      statistics,
      sentiment: toSentimentReport(rawSentiment),
      topWords,
      summary,
      charts,
      keywords,
      sentimentConfidence: sentimentConfidence(rawSentiment),
      degraded,
    }
  }
}

function failure(code: ErrorCode, message: string): AnalysisFailure {
  return {
    success: false,
    code,
    error: `Analysis failed: ${message}`,
  }
}

/**
 * 共享的只读分析器实例
 */
export const contentAnalyzer = new ContentAnalyzer()
