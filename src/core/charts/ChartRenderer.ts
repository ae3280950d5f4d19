import { createCanvas, type SKRSContext2D } from "@napi-rs/canvas"

import type {
  AnalysisStage,
  ChartKind,
  ChartSet,
  RawSentimentScores,
  StageFailure,
  WordCount,
} from "@/types/analysis"
import type { BarChartSpec } from "@/types/chart"
import { DARK_THEME, type ChartTheme } from "@/types/config"
import { ErrorCode, handleSync } from "@/utils/errors"

import { buildKeywordChart, buildSentimentChart, chartPadding, layoutBars } from "./chart-data"

const PNG_DATA_URI_PREFIX = "data:image/png;base64,"

/**
 * 图表渲染结果
 */
export interface ChartRenderOutcome {
  charts: ChartSet
  failures: StageFailure[]
}

/**
 * 图表渲染器
 *
 * 在 2D Canvas 上绘制柱状图并编码为可直接嵌入的 PNG data URI。
 * 两张图各自独立渲染，任何一张失败只记录日志，不影响另一张
 */
export class ChartRenderer {
  constructor(private readonly theme: ChartTheme = DARK_THEME) {}

  /**
   * 情感分布图
   */
  renderSentimentChart(scores: RawSentimentScores): string {
    return this.render(buildSentimentChart(scores, this.theme))
  }

  /**
   * 高频词图
   *
   * @returns 没有关键词时返回 null
   */
  renderKeywordChart(topWords: readonly WordCount[], limit: number = 8): string | null {
    const spec = buildKeywordChart(topWords, limit, this.theme)
    return spec ? this.render(spec) : null
  }

  /**
   * 渲染全部图表
   *
   * 结果中可能包含 0、1 或 2 张图
   */
  renderCharts(
    scores: RawSentimentScores,
    topWords: readonly WordCount[],
    keywordLimit: number = 8
  ): ChartRenderOutcome {
    const charts: ChartSet = {}
    const failures: StageFailure[] = []

    const attempt = (kind: ChartKind, stage: AnalysisStage, draw: () => string | null): void => {
      const result = handleSync(draw, {
        code: ErrorCode.CHART_RENDER_ERROR,
        tag: "ChartRenderer",
        operation: `渲染${kind}图表`,
        context: { stage },
      })

      if (!result.ok) {
        failures.push({ stage, code: result.error.code, message: result.error.message })
        return
      }
      if (result.value !== null) {
        charts[kind] = result.value
      }
    }

    attempt("sentiment", "sentimentChart", () => this.renderSentimentChart(scores))
    attempt("words", "keywordChart", () => this.renderKeywordChart(topWords, keywordLimit))

    return { charts, failures }
  }

  /**
   * 绘制柱状图并编码为 PNG data URI
   */
  render(spec: BarChartSpec): string {
    const canvas = createCanvas(spec.width, spec.height)
    const ctx = canvas.getContext("2d")

    ctx.fillStyle = this.theme.background
    ctx.fillRect(0, 0, spec.width, spec.height)

    this.drawTitle(ctx, spec)
    this.drawAxes(ctx, spec)
    this.drawBars(ctx, spec)

    const png = canvas.toBuffer("image/png")
    return `${PNG_DATA_URI_PREFIX}${png.toString("base64")}`
  }

  private drawTitle(ctx: SKRSContext2D, spec: BarChartSpec): void {
    ctx.fillStyle = this.theme.text
    ctx.font = `20px ${this.theme.fontFamily}`
    ctx.textAlign = "center"
    ctx.textBaseline = "middle"
    ctx.fillText(spec.title, spec.width / 2, 32)
  }

  private drawAxes(ctx: SKRSContext2D, spec: BarChartSpec): void {
    const padding = chartPadding(spec)
    const left = padding.left
    const bottom = spec.height - padding.bottom

    ctx.strokeStyle = this.theme.axis
    ctx.lineWidth = 1
    ctx.beginPath()
    ctx.moveTo(left, padding.top)
    ctx.lineTo(left, bottom)
    ctx.lineTo(spec.width - padding.right, bottom)
    ctx.stroke()

    ctx.fillStyle = this.theme.text
    ctx.font = `14px ${this.theme.fontFamily}`
    ctx.textAlign = "center"
    ctx.textBaseline = "middle"

    if (spec.orientation === "vertical") {
      // 数值轴在左侧，标题竖排
      ctx.save()
      ctx.translate(24, padding.top + (bottom - padding.top) / 2)
      ctx.rotate(-Math.PI / 2)
      ctx.fillText(spec.axisLabel, 0, 0)
      ctx.restore()
    } else {
      ctx.fillText(spec.axisLabel, left + (spec.width - padding.right - left) / 2, spec.height - 20)
    }
  }

  private drawBars(ctx: SKRSContext2D, spec: BarChartSpec): void {
    ctx.font = `13px ${this.theme.fontFamily}`

    for (const { bar, rect, labelAnchor, annotationAnchor } of layoutBars(spec)) {
      ctx.fillStyle = bar.color
      ctx.fillRect(rect.x, rect.y, rect.width, rect.height)

      ctx.fillStyle = this.theme.text
      ctx.textBaseline = "middle"
      if (spec.orientation === "vertical") {
        ctx.textAlign = "center"
        ctx.fillText(bar.label, labelAnchor.x, labelAnchor.y)
        ctx.textBaseline = "bottom"
        ctx.fillText(bar.annotation, annotationAnchor.x, annotationAnchor.y)
      } else {
        ctx.textAlign = "right"
        ctx.fillText(bar.label, labelAnchor.x, labelAnchor.y)
        ctx.textAlign = "left"
        ctx.fillText(bar.annotation, annotationAnchor.x, annotationAnchor.y)
      }
    }
  }
}
