/**
 * 文本统计与可读性
 *
 * 字数按空白分割原文计算（不是分词后的词数）；可读性基于原文计算
 */

import type { ReadabilityScores, TextStatistics } from "@/types/analysis"
import { AppError, ErrorCode } from "@/utils/errors"

/**
 * 可读性计算失败时使用的分数
 */
export const READABILITY_FALLBACK: ReadabilityScores = {
  readabilityScore: 0,
  gradeLevel: 0,
}

/**
 * 四舍五入到指定小数位（-0 归一为 0）
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor || 0
}

/**
 * 按空白分割的词数
 */
export function countWords(content: string): number {
  return content.split(/\s+/).filter((part) => part.length > 0).length
}

/**
 * 估算英文单词音节数
 *
 * 元音组计数，去掉不发音的词尾 e / es / ed
 */
export function countSyllables(word: string): number {
  const normalized = word.toLowerCase().replace(/[^a-z]/g, "")
  if (normalized.length === 0) {
    return 0
  }
  if (normalized.length <= 3) {
    return 1
  }

  const trimmed = normalized
    .replace(/(?:[^laeiouy]es|[^laeiouy]ed|[^laeiouy]e)$/, "")
    .replace(/^y/, "")
  const groups = trimmed.match(/[aeiouy]{1,2}/g)

  return Math.max(groups?.length ?? 0, 1)
}

/**
 * 计算 Flesch Reading Ease 和 Flesch-Kincaid Grade Level
 *
 * 没有可计数的单词时抛出 READABILITY_ERROR；没有句子时整段按一句计算
 *
 * @param content 原文
 * @param sentenceCount 分句数量
 */
export function computeReadability(content: string, sentenceCount: number): ReadabilityScores {
  const words = content
    .split(/\s+/)
    .map((part) => part.replace(/[^A-Za-z]/g, ""))
    .filter((part) => part.length > 0)

  if (words.length === 0) {
    throw new AppError(
      "Readability requires at least one countable word",
      ErrorCode.READABILITY_ERROR,
      { sentenceCount }
    )
  }

  const sentences = Math.max(sentenceCount, 1)
  const syllables = words.reduce((sum, word) => sum + countSyllables(word), 0)

  const wordsPerSentence = words.length / sentences
  const syllablesPerWord = syllables / words.length

  return {
    readabilityScore: roundTo(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord, 2),
    gradeLevel: roundTo(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59, 2),
  }
}

/**
 * 汇总基础统计
 *
 * @param content 原文
 * @param sentences 分句结果
 * @param readability 可读性分数（已处理降级）
 */
export function computeStatistics(
  content: string,
  sentences: readonly string[],
  readability: ReadabilityScores
): TextStatistics {
  const wordCount = countWords(content)
  const sentenceCount = sentences.length

  return {
    wordCount,
    characterCount: Array.from(content).length,
    sentenceCount,
    avgSentenceLength: sentenceCount > 0 ? roundTo(wordCount / sentenceCount, 2) : 0,
    readabilityScore: readability.readabilityScore,
    gradeLevel: readability.gradeLevel,
  }
}
