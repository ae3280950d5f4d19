import * as stopword from "stopword"

import type { WordCount } from "@/types/analysis"

/**
 * 词频表
 *
 * 同时记录每个词的出现次数和首次出现位置，排序时按
 * (次数降序, 首次出现位置升序)，与容器的迭代顺序无关
 */
export class FrequencyTable {
  private readonly entries = new Map<string, { count: number; firstIndex: number }>()
  private seen = 0

  constructor(words: Iterable<string> = []) {
    for (const word of words) {
      this.add(word)
    }
  }

  add(word: string, times: number = 1): void {
    const entry = this.entries.get(word)
    if (entry) {
      entry.count += times
    } else {
      this.entries.set(word, { count: times, firstIndex: this.seen })
    }
    this.seen += 1
  }

  get(word: string): number {
    return this.entries.get(word)?.count ?? 0
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * 取前 n 个高频词
   */
  top(n: number): WordCount[] {
    return Array.from(this.entries, ([word, entry]) => ({ word, ...entry }))
      .sort((a, b) => b.count - a.count || a.firstIndex - b.firstIndex)
      .slice(0, Math.max(n, 0))
      .map(({ word, count }) => ({ word, count }))
  }
}

/**
 * 关键词提取结果
 */
export interface KeywordExtraction {
  frequencies: FrequencyTable
  topWords: WordCount[]
  keywords: string[]
}

/**
 * 关键词提取器
 *
 * 只保留纯字母且不在英文停用词表中的词，按词频排序
 */
export class KeywordExtractor {
  private readonly stopwords: ReadonlySet<string>

  constructor(extraStopwords: readonly string[] = []) {
    this.stopwords = new Set([
      ...stopword.eng,
      ...extraStopwords.map((word) => word.toLowerCase()),
    ])
  }

  /**
   * 过滤小写词袋
   */
  filter(tokens: readonly string[]): string[] {
    return tokens.filter((token) => /^\p{L}+$/u.test(token) && !this.stopwords.has(token))
  }

  isStopword(word: string): boolean {
    return this.stopwords.has(word.toLowerCase())
  }

  /**
   * 提取关键词
   *
   * @param tokens 小写词袋（过滤前）
   * @param topK 返回前 K 个
   */
  extract(tokens: readonly string[], topK: number = 10): KeywordExtraction {
    const frequencies = new FrequencyTable(this.filter(tokens))
    const topWords = frequencies.top(topK)

    return {
      frequencies,
      topWords,
      keywords: topWords.map((entry) => entry.word),
    }
  }
}
