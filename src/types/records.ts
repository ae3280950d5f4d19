/**
 * 分析记录（评论 / 回复持久化字段）
 */

import type { SentimentLabel, WordCount } from "./analysis"

/**
 * 一条评论或回复上保存的分析字段
 */
export interface AnalysisRecord {
  sentimentScore: number
  sentimentLabel: SentimentLabel
  sentimentConfidence: number
  positiveScore: number
  negativeScore: number
  neutralScore: number
  wordCount: number
  readabilityScore: number
  /** JSON 字符串形式的关键词列表 */
  keywords: string
  analyzedAt: Date
}

export interface SentimentDistribution {
  positive: number
  negative: number
  neutral: number
}

/**
 * 多条记录的汇总指标
 */
export interface RecordSummary {
  total: number
  averageSentiment: number
  distribution: SentimentDistribution
  topKeywords: WordCount[]
}

/**
 * 情感趋势的分桶粒度：最近 30 天按天，最近 4 周按周
 */
export type TrendBucket = "day" | "week"

/**
 * 一个时间段内的平均情感
 */
export interface TrendPoint {
  /** 按天为 YYYY-MM-DD（UTC），按周为 "Week 1" … "Week 4"（Week 4 为最近一周） */
  period: string
  /** 平均 compound，3 位小数 */
  sentiment: number
  count: number
}
