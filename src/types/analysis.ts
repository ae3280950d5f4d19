/**
 * 内容分析相关类型
 */

import type { ErrorCode } from "@/utils/errors"

/**
 * 分析请求
 */
export interface AnalysisRequest {
  readonly content: string
  readonly title?: string
}

/**
 * 词频条目
 */
export interface WordCount {
  word: string
  count: number
}

/**
 * 情感标签
 */
export type SentimentLabel = "Positive" | "Negative" | "Neutral"

/**
 * 原始情感分数（未取整，供图表使用）
 */
export interface RawSentimentScores {
  pos: number
  neg: number
  neu: number
  /** [-1, 1] */
  compound: number
}

/**
 * 对外报告的情感分数（保留 3 位小数）
 */
export interface SentimentReport {
  compound: number
  positive: number
  negative: number
  neutral: number
  label: SentimentLabel
}

export interface ReadabilityScores {
  /** Flesch Reading Ease */
  readabilityScore: number
  /** Flesch-Kincaid Grade Level */
  gradeLevel: number
}

export interface TextStatistics extends ReadabilityScores {
  wordCount: number
  characterCount: number
  sentenceCount: number
  avgSentenceLength: number
}

/**
 * 图表类型
 */
export type ChartKind = "sentiment" | "words"

/**
 * 图表集合，值为 data:image/png;base64 URI
 */
export type ChartSet = Partial<Record<ChartKind, string>>

/**
 * 可降级的流水线阶段
 */
export type AnalysisStage =
  | "readability"
  | "summary"
  | "sentimentChart"
  | "keywordChart"

/**
 * 阶段降级记录
 */
export interface StageFailure {
  stage: AnalysisStage
  code: ErrorCode
  message: string
}

/**
 * 分析成功结果
 */
export interface AnalysisResult {
  success: true
  title: string
  statistics: TextStatistics
  sentiment: SentimentReport
  topWords: WordCount[]
  summary: string
  charts: ChartSet
  keywords: string[]
  sentimentConfidence: number
  /** 降级（使用了默认值）的阶段 */
  degraded: StageFailure[]
}

/**
 * 分析中止结果
 */
export interface AnalysisFailure {
  success: false
  code: ErrorCode
  error: string
}

export type AnalysisResponse = AnalysisResult | AnalysisFailure
