/**
 * 图表数据整形
 *
 * 把情感分数和词频转换为柱状图描述，以及计算柱子的几何布局。
 * 这里不涉及任何绘制，便于单独测试
 */

import type { RawSentimentScores, WordCount } from "@/types/analysis"
import type { BarChartSpec, BarLayout, ChartPadding } from "@/types/chart"
import { DARK_THEME, type ChartTheme } from "@/types/config"

/** 柱宽占每个分类槽位的比例 */
const BAR_FILL_RATIO = 0.8

/** 数值轴最大值相对数据最大值的余量 */
const VALUE_HEADROOM = 1.1

const VERTICAL_PADDING: ChartPadding = { top: 70, right: 40, bottom: 60, left: 80 }
const HORIZONTAL_PADDING: ChartPadding = { top: 70, right: 70, bottom: 60, left: 150 }

/**
 * 情感分布图：Positive / Negative / Neutral 三根竖柱，标注保留 2 位小数
 */
export function buildSentimentChart(
  scores: RawSentimentScores,
  theme: ChartTheme = DARK_THEME
): BarChartSpec {
  const [positiveColor, negativeColor, neutralColor] = theme.sentimentBars

  return {
    title: "Sentiment Analysis",
    axisLabel: "Score",
    orientation: "vertical",
    width: 800,
    height: 600,
    bars: [
      { label: "Positive", value: scores.pos, annotation: scores.pos.toFixed(2), color: positiveColor },
      { label: "Negative", value: scores.neg, annotation: scores.neg.toFixed(2), color: negativeColor },
      { label: "Neutral", value: scores.neu, annotation: scores.neu.toFixed(2), color: neutralColor },
    ],
  }
}

/**
 * 高频词图：前 limit 个词的横向柱状图，标注为整数词频
 *
 * @returns 没有关键词时返回 null（不生成该图）
 */
export function buildKeywordChart(
  topWords: readonly WordCount[],
  limit: number = 8,
  theme: ChartTheme = DARK_THEME
): BarChartSpec | null {
  const words = topWords.slice(0, limit)
  if (words.length === 0) {
    return null
  }

  return {
    title: "Most Frequent Words",
    axisLabel: "Frequency",
    orientation: "horizontal",
    width: 1000,
    height: 600,
    bars: words.map(({ word, count }) => ({
      label: word,
      value: count,
      annotation: String(Math.trunc(count)),
      color: theme.keywordBar,
    })),
  }
}

export function chartPadding(spec: BarChartSpec): ChartPadding {
  return spec.orientation === "vertical" ? VERTICAL_PADDING : HORIZONTAL_PADDING
}

/**
 * 数值轴最大值；全为 0 时取 1，避免除零
 */
export function valueAxisMax(spec: BarChartSpec): number {
  const max = Math.max(0, ...spec.bars.map((bar) => bar.value))
  return max > 0 ? max * VALUE_HEADROOM : 1
}

/**
 * 计算柱子布局
 *
 * 竖向图从左到右排列；横向图按输入顺序从上到下排列（频率最高的在最上面）
 */
export function layoutBars(spec: BarChartSpec): BarLayout[] {
  const padding = chartPadding(spec)
  const plotWidth = spec.width - padding.left - padding.right
  const plotHeight = spec.height - padding.top - padding.bottom
  const max = valueAxisMax(spec)
  const count = spec.bars.length

  if (count === 0) {
    return []
  }

  if (spec.orientation === "vertical") {
    const slot = plotWidth / count
    const barWidth = slot * BAR_FILL_RATIO
    const baseline = padding.top + plotHeight

    return spec.bars.map((bar, index) => {
      const x = padding.left + index * slot + (slot - barWidth) / 2
      const height = (Math.max(bar.value, 0) / max) * plotHeight
      const y = baseline - height
      return {
        bar,
        rect: { x, y, width: barWidth, height },
        labelAnchor: { x: x + barWidth / 2, y: baseline + 20 },
        annotationAnchor: { x: x + barWidth / 2, y: y - 8 },
      }
    })
  }

  const slot = plotHeight / count
  const barHeight = slot * BAR_FILL_RATIO

  return spec.bars.map((bar, index) => {
    const y = padding.top + index * slot + (slot - barHeight) / 2
    const width = (Math.max(bar.value, 0) / max) * plotWidth
    return {
      bar,
      rect: { x: padding.left, y, width, height: barHeight },
      labelAnchor: { x: padding.left - 10, y: y + barHeight / 2 },
      annotationAnchor: { x: padding.left + width + 8, y: y + barHeight / 2 },
    }
  })
}
