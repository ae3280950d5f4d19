/**
 * 配置类型定义
 */

/**
 * 内容分析配置
 */
export interface AnalyzerConfig {
  /** 关键词数量上限 */
  topWordCount: number
  /** 关键词图表中展示的词数 */
  chartWordCount: number
  /** 摘要失败时截断的字符数 */
  summaryFallbackLength: number
  /** 是否生成图表 */
  renderCharts: boolean
  /** 额外停用词（小写） */
  extraStopwords: string[]
  /** 未提供标题时使用的标题 */
  defaultTitle: string
}

/**
 * 默认分析配置
 */
export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  topWordCount: 10,
  chartWordCount: 8,
  summaryFallbackLength: 500,
  renderCharts: true,
  extraStopwords: [],
  defaultTitle: "Untitled",
}

/**
 * 图表配色
 */
export interface ChartTheme {
  background: string
  text: string
  /** 情感图三根柱子依次使用的颜色 */
  sentimentBars: [string, string, string]
  keywordBar: string
  axis: string
  fontFamily: string
}

/**
 * 深色主题
 */
export const DARK_THEME: ChartTheme = {
  background: "#332621",
  text: "#e8e3d3",
  sentimentBars: ["#ff6b47", "#8b6914", "#52525b"],
  keywordBar: "#ff6b47",
  axis: "#6b5a52",
  fontFamily: "sans-serif",
}
