import { describe, it, expect } from "vitest"

import { AppError, ErrorCode } from "@/utils/errors"

import {
  computeReadability,
  computeStatistics,
  countSyllables,
  countWords,
  READABILITY_FALLBACK,
  roundTo,
} from "./statistics"

describe("countWords", () => {
  it("按空白分割计数", () => {
    expect(countWords("  The quick\tbrown\nfox  ")).toBe(4)
    expect(countWords("")).toBe(0)
  })
})

describe("countSyllables", () => {
  it.each([
    ["cat", 1],
    ["happy", 2],
    ["table", 2],
    ["reading", 2],
    ["", 0],
  ])("%s -> %s", (word, expected) => {
    expect(countSyllables(word)).toBe(expected)
  })
})

describe("roundTo", () => {
  it("四舍五入到指定小数位", () => {
    expect(roundTo(2.3333, 2)).toBe(2.33)
    expect(roundTo(0.4567, 3)).toBe(0.457)
  })

  it("接近 0 的负数取整后为 0 而不是 -0", () => {
    expect(Object.is(roundTo(-0.0004, 3), 0)).toBe(true)
    expect(roundTo(-0.0006, 3)).toBe(-0.001)
  })
})

describe("computeReadability", () => {
  it("计算 Flesch 分数", () => {
    const scores = computeReadability("The cat sat. The dog ran.", 2)

    expect(scores.readabilityScore).toBeCloseTo(119.19, 2)
    expect(scores.gradeLevel).toBeCloseTo(-2.62, 2)
  })

  it("没有句子时整段按一句计算", () => {
    const scores = computeReadability("The cat sat", 0)

    expect(scores.readabilityScore).toBeCloseTo(119.19, 2)
    expect(scores.gradeLevel).toBeCloseTo(-2.62, 2)
  })

  it("没有字母单词时抛出 READABILITY_ERROR", () => {
    let caught: unknown
    try {
      computeReadability("123 456", 1)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(AppError)
    expect(caught).toMatchObject({ code: ErrorCode.READABILITY_ERROR })
  })
})

describe("computeStatistics", () => {
  it("汇总字数、字符数和平均句长", () => {
    const content = "The cat sat. The dog ran."
    const stats = computeStatistics(content, ["The cat sat.", "The dog ran."], {
      readabilityScore: 119.19,
      gradeLevel: -2.62,
    })

    expect(stats).toEqual({
      wordCount: 6,
      characterCount: 25,
      sentenceCount: 2,
      avgSentenceLength: 3,
      readabilityScore: 119.19,
      gradeLevel: -2.62,
    })
  })

  it("平均句长保留 2 位小数", () => {
    const stats = computeStatistics("a b c d e f g", ["a b c", "d e", "f g"], READABILITY_FALLBACK)
    expect(stats.avgSentenceLength).toBe(2.33)
  })

  it("没有句子时平均句长为 0", () => {
    const stats = computeStatistics("words here", [], READABILITY_FALLBACK)
    expect(stats.avgSentenceLength).toBe(0)
    expect(stats.readabilityScore).toBe(0)
  })

  it("字符数按码点计算", () => {
    const stats = computeStatistics("ok \u{1F600}", ["ok \u{1F600}"], READABILITY_FALLBACK)
    expect(stats.characterCount).toBe(4)
  })
})
