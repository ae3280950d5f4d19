import { describe, it, expect } from "vitest"

import { DARK_THEME } from "@/types/config"

import { buildKeywordChart, buildSentimentChart, chartPadding, layoutBars, valueAxisMax } from "./chart-data"

describe("buildSentimentChart", () => {
  it("三根竖柱，标注保留 2 位小数", () => {
    const spec = buildSentimentChart({ pos: 0.456, neg: 0.123, neu: 0.421, compound: 0.3 })

    expect(spec.orientation).toBe("vertical")
    expect(spec.title).toBe("Sentiment Analysis")
    expect(spec.axisLabel).toBe("Score")
    expect([spec.width, spec.height]).toEqual([800, 600])
    expect(spec.bars.map((bar) => bar.label)).toEqual(["Positive", "Negative", "Neutral"])
    expect(spec.bars.map((bar) => bar.annotation)).toEqual(["0.46", "0.12", "0.42"])
    expect(spec.bars.map((bar) => bar.color)).toEqual(DARK_THEME.sentimentBars)
  })
})

describe("buildKeywordChart", () => {
  const words = Array.from({ length: 10 }, (_, index) => ({ word: `w${index}`, count: 10 - index }))

  it("只取前 limit 个词", () => {
    const spec = buildKeywordChart(words, 8)

    expect(spec).not.toBeNull()
    expect(spec?.orientation).toBe("horizontal")
    expect(spec?.title).toBe("Most Frequent Words")
    expect(spec?.bars).toHaveLength(8)
    expect(spec?.bars[0]).toEqual({ label: "w0", value: 10, annotation: "10", color: DARK_THEME.keywordBar })
  })

  it("没有关键词时返回 null", () => {
    expect(buildKeywordChart([])).toBeNull()
  })
})

describe("valueAxisMax", () => {
  it("全为 0 时取 1", () => {
    expect(valueAxisMax(buildSentimentChart({ pos: 0, neg: 0, neu: 0, compound: 0 }))).toBe(1)
  })

  it("最大值留 10% 余量", () => {
    const spec = buildKeywordChart([{ word: "a", count: 2 }])
    expect(spec && valueAxisMax(spec)).toBeCloseTo(2.2)
  })
})

describe("layoutBars", () => {
  it("竖向图从基线向上，高度与数值成比例", () => {
    const spec = buildSentimentChart({ pos: 1, neg: 0.5, neu: 0, compound: 0.5 })
    const layout = layoutBars(spec)
    const padding = chartPadding(spec)
    const baseline = spec.height - padding.bottom

    expect(baseline).toBe(padding.top + 470)
    expect(baseline).toBe(540)
    expect(layout).toHaveLength(3)
    expect(layout[0].rect.height).toBeCloseTo((1 / 1.1) * 470)
    expect(layout[1].rect.height).toBeCloseTo((0.5 / 1.1) * 470)
    expect(layout[2].rect.height).toBe(0)
    for (const { rect, labelAnchor } of layout) {
      expect(rect.y + rect.height).toBeCloseTo(baseline)
      expect(labelAnchor.y).toBe(baseline + 20)
    }
    expect(layout[0].rect.x).toBeLessThan(layout[1].rect.x)
  })

  it("横向图第一个词在最上面", () => {
    const spec = buildKeywordChart([
      { word: "a", count: 4 },
      { word: "b", count: 2 },
    ])
    const layout = spec ? layoutBars(spec) : []

    expect(layout).toHaveLength(2)
    expect(layout[0].rect.y).toBeCloseTo(93.5)
    expect(layout[1].rect.y).toBeCloseTo(328.5)
    expect(layout[0].rect.x).toBe(150)
    expect(layout[0].rect.width).toBeCloseTo(709.09, 2)
    expect(layout[1].rect.width).toBeCloseTo(354.55, 2)
    expect(layout[0].labelAnchor.x).toBe(140)
  })
})
