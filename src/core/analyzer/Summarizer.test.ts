import { describe, it, expect } from "vitest"

import { Summarizer } from "./Summarizer"

describe("Summarizer", () => {
  const summarizer = new Summarizer()

  it("不超过 3 句时返回原文", () => {
    const content = "First line.  Second line.\nThird line."
    expect(summarizer.summarize(content, ["First line.", "Second line.", "Third line."])).toBe(content)
    expect(summarizer.summarize("Only one", ["Only one"])).toBe("Only one")
  })

  it("取首句、中间句和末句", () => {
    const sentences = ["s0.", "s1.", "s2.", "s3.", "s4.", "s5.", "s6."]
    expect(summarizer.summarize(sentences.join(" "), sentences)).toBe("s0. s3. s6.")
  })

  it("偶数句数时中间句取后半段第一句", () => {
    const sentences = ["A.", "B.", "C.", "D."]
    expect(summarizer.summarize(sentences.join(" "), sentences)).toBe("A. C. D.")
  })

  it("降级时截断超长原文", () => {
    const content = "x".repeat(600)
    const fallback = summarizer.fallback(content)

    expect(fallback).toHaveLength(503)
    expect(fallback).toBe(`${"x".repeat(500)}...`)
    expect(summarizer.fallback("short")).toBe("short")
  })

  it("截断长度可配置", () => {
    expect(new Summarizer(4).fallback("abcdefgh")).toBe("abcd...")
  })
})
