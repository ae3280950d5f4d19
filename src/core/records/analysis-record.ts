/**
 * 分析记录
 *
 * 把分析结果映射为评论/回复上保存的字段，以及对多条记录做汇总
 * （情感分布、平均情感、跨记录的高频关键词）
 */

import { FrequencyTable } from "@/core/analyzer/KeywordExtractor"
import { roundTo } from "@/core/analyzer/statistics"
import type { AnalysisResult } from "@/types/analysis"
import type {
  AnalysisRecord,
  RecordSummary,
  SentimentDistribution,
  TrendBucket,
  TrendPoint,
} from "@/types/records"
import { AppError, ErrorCode, handleSync } from "@/utils/errors"

/**
 * 分析结果 → 持久化字段
 *
 * @param analyzedAt 分析时间
 */
export function toAnalysisRecord(result: AnalysisResult, analyzedAt: Date = new Date()): AnalysisRecord {
  return {
    sentimentScore: result.sentiment.compound,
    sentimentLabel: result.sentiment.label,
    sentimentConfidence: result.sentimentConfidence,
    positiveScore: result.sentiment.positive,
    negativeScore: result.sentiment.negative,
    neutralScore: result.sentiment.neutral,
    wordCount: result.statistics.wordCount,
    readabilityScore: result.statistics.readabilityScore,
    keywords: JSON.stringify(result.keywords),
    analyzedAt,
  }
}

/**
 * 解析记录中的关键词 JSON
 *
 * 无法解析或结构不对时返回空数组（记录错误日志）
 */
export function parseKeywords(serialized: string | null | undefined): string[] {
  if (!serialized) {
    return []
  }

  const result = handleSync(
    (): string[] => {
      const parsed: unknown = JSON.parse(serialized)
      if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
        throw new AppError("Keywords must be a JSON array of strings", ErrorCode.RECORD_PARSE_ERROR)
      }
      return parsed
    },
    {
      code: ErrorCode.RECORD_PARSE_ERROR,
      tag: "AnalysisRecord",
      operation: "解析关键词",
      context: { serialized },
    }
  )

  return result.ok ? result.value : []
}

/**
 * 汇总多条记录
 *
 * 平均情感保留 3 位小数
 *
 * @param topN 跨记录高频关键词数量
 */
export function summarizeRecords(records: readonly AnalysisRecord[], topN: number = 20): RecordSummary {
  const distribution: SentimentDistribution = { positive: 0, negative: 0, neutral: 0 }

  if (records.length === 0) {
    return { total: 0, averageSentiment: 0, distribution, topKeywords: [] }
  }

  const keywords = new FrequencyTable()
  let sentimentSum = 0

  for (const record of records) {
    sentimentSum += record.sentimentScore
    switch (record.sentimentLabel) {
      case "Positive":
        distribution.positive += 1
        break
      case "Negative":
        distribution.negative += 1
        break
      case "Neutral":
        distribution.neutral += 1
        break
    }
    for (const keyword of parseKeywords(record.keywords)) {
      keywords.add(keyword)
    }
  }

  return {
    total: records.length,
    averageSentiment: roundTo(sentimentSum / records.length, 3),
    distribution,
    topKeywords: keywords.top(topN),
  }
}

const DAY_MS = 24 * 60 * 60 * 1000
const WEEK_MS = 7 * DAY_MS

/** 按天统计的天数 */
const TREND_DAYS = 30
/** 按周统计的周数 */
const TREND_WEEKS = 4

/**
 * UTC 日期键（YYYY-MM-DD）
 */
function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10)
}

function averagePoint(period: string, records: readonly AnalysisRecord[]): TrendPoint {
  const sum = records.reduce((total, record) => total + record.sentimentScore, 0)
  return { period, sentiment: roundTo(sum / records.length, 3), count: records.length }
}

/**
 * 情感趋势
 *
 * - day：最近 30 天（含今天），按 UTC 日期分组
 * - week：最近 4 周，第 i 周为 [now - (i+1) 周, now - i 周]，两端都包含
 *
 * 没有记录的时间段不输出；结果按时间从早到晚排列
 *
 * @param now 统计截止时间
 */
export function sentimentTrend(
  records: readonly AnalysisRecord[],
  bucket: TrendBucket,
  now: Date = new Date()
): TrendPoint[] {
  const points: TrendPoint[] = []

  if (bucket === "day") {
    for (let i = TREND_DAYS - 1; i >= 0; i--) {
      const key = dayKey(new Date(now.getTime() - i * DAY_MS))
      const matching = records.filter((record) => dayKey(record.analyzedAt) === key)
      if (matching.length > 0) {
        points.push(averagePoint(key, matching))
      }
    }
    return points
  }

  for (let i = TREND_WEEKS - 1; i >= 0; i--) {
    const end = now.getTime() - i * WEEK_MS
    const start = end - WEEK_MS
    const matching = records.filter((record) => {
      const time = record.analyzedAt.getTime()
      return time >= start && time <= end
    })
    if (matching.length > 0) {
      points.push(averagePoint(`Week ${TREND_WEEKS - i}`, matching))
    }
  }
  return points
}
