/**
 * 图表模块
 */

export { ChartRenderer, type ChartRenderOutcome } from "./ChartRenderer"
export { buildKeywordChart, buildSentimentChart, layoutBars, valueAxisMax } from "./chart-data"
export type { BarChartSpec, BarDatum, BarLayout } from "@/types/chart"
