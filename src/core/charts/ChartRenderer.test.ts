import { afterEach, beforeEach, describe, it, expect, vi } from "vitest"

import { ErrorCode } from "@/utils/errors"

import { ChartRenderer } from "./ChartRenderer"

const PREFIX = "data:image/png;base64,"
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

function decode(uri: string): Buffer {
  return Buffer.from(uri.slice(PREFIX.length), "base64")
}

describe("ChartRenderer", () => {
  const scores = { pos: 0.5, neg: 0.1, neu: 0.4, compound: 0.6 }
  const topWords = [
    { word: "coffee", count: 3 },
    { word: "espresso", count: 2 },
  ]

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("情感图编码为 PNG data URI", () => {
    const uri = new ChartRenderer().renderSentimentChart(scores)

    expect(uri.startsWith(PREFIX)).toBe(true)
    expect(Array.from(decode(uri).subarray(0, 8))).toEqual(PNG_SIGNATURE)
  })

  it("没有关键词时不生成高频词图", () => {
    expect(new ChartRenderer().renderKeywordChart([])).toBeNull()
  })

  it("renderCharts 生成两张图", () => {
    const { charts, failures } = new ChartRenderer().renderCharts(scores, topWords)

    expect(Object.keys(charts).sort()).toEqual(["sentiment", "words"])
    expect(charts.words?.startsWith(PREFIX)).toBe(true)
    expect(failures).toEqual([])
  })

  it("一张图失败不影响另一张", () => {
    const renderer = new ChartRenderer()
    vi.spyOn(renderer, "renderSentimentChart").mockImplementation(() => {
      throw new Error("canvas unavailable")
    })

    const { charts, failures } = renderer.renderCharts(scores, topWords)

    expect(charts.sentiment).toBeUndefined()
    expect(charts.words?.startsWith(PREFIX)).toBe(true)
    expect(failures).toEqual([
      { stage: "sentimentChart", code: ErrorCode.CHART_RENDER_ERROR, message: "canvas unavailable" },
    ])
    expect(console.error).toHaveBeenCalledTimes(1)
  })
})
