import vader from "vader-sentiment"

import type { RawSentimentScores, SentimentLabel, SentimentReport } from "@/types/analysis"

import { roundTo } from "./statistics"

/**
 * 情感打分器
 *
 * 整段文本打分（不逐句），返回未取整的分数
 */
export interface SentimentScorer {
  readonly name: string
  polarityScores(text: string): RawSentimentScores
}

/**
 * 基于 VADER 词典的情感打分
 *
 * 处理否定、程度副词、标点强调等规则
 */
export class VaderSentimentScorer implements SentimentScorer {
  readonly name = "vader"

  polarityScores(text: string): RawSentimentScores {
    const { pos, neg, neu, compound } = vader.SentimentIntensityAnalyzer.polarity_scores(text)
    return { pos, neg, neu, compound }
  }
}

/**
 * compound 分数转标签
 *
 * >= 0.05 为正面，<= -0.05 为负面，其余为中性
 */
export function sentimentLabel(compound: number): SentimentLabel {
  if (compound >= 0.05) {
    return "Positive"
  }
  if (compound <= -0.05) {
    return "Negative"
  }
  return "Neutral"
}

/**
 * 置信度：三个分量中的最大值
 */
export function sentimentConfidence(scores: RawSentimentScores): number {
  return Math.max(scores.pos, scores.neg, scores.neu)
}

/**
 * 生成对外报告（3 位小数），标签基于未取整的 compound
 */
export function toSentimentReport(scores: RawSentimentScores): SentimentReport {
  return {
    compound: roundTo(scores.compound, 3),
    positive: roundTo(scores.pos, 3),
    negative: roundTo(scores.neg, 3),
    neutral: roundTo(scores.neu, 3),
    label: sentimentLabel(scores.compound),
  }
}
