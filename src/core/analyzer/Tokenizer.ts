import natural from "natural"

/**
 * 句尾常见缩写（小写，不含末尾的点）
 *
 * 句子分割器会在这些缩写后断句，需要把断开的两段重新拼回
 */
const ABBREVIATIONS = new Set([
  "mr", "mrs", "ms", "dr", "prof", "sr", "jr", "st", "vs", "e.g", "i.e", "approx",
  "u.s", "u.k", "etc", "inc",
])

/**
 * 只在后面紧跟数字时才算缩写（"No. 5"），否则是普通句尾的 "no."
 */
const NUMBER_ABBREVIATIONS = new Set(["no"])

/**
 * 单词：字母或数字串，撇号连接的后缀（don't、it's）留在同一个词里
 */
const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu

/**
 * 分词器
 *
 * 句子分割和英文分词，供下游各阶段共用
 *
 * @example
 * ```typescript
 * const tokenizer = new Tokenizer()
 * tokenizer.sentences("Dr. Smith arrived. He was late.")
 * // ['Dr. Smith arrived.', 'He was late.']
 * tokenizer.words("Great Product!") // ['great', 'product']
 * ```
 */
export class Tokenizer {
  private readonly sentenceTokenizer: InstanceType<typeof natural.SentenceTokenizer>
  private readonly wordTokenizer: InstanceType<typeof natural.RegexpTokenizer>

  constructor() {
    this.sentenceTokenizer = new natural.SentenceTokenizer()
    this.wordTokenizer = new natural.RegexpTokenizer({ pattern: WORD_PATTERN, gaps: false })
  }

  /**
   * 句子分割
   *
   * @returns 按原文顺序排列的句子；没有句子结构时为空数组
   */
  sentences(text: string): string[] {
    if (!text || text.trim().length === 0) {
      return []
    }

    const raw = (this.sentenceTokenizer.tokenize(text) ?? [])
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0)

    return this.mergeAbbreviations(raw)
  }

  /**
   * 英文分词（小写）
   *
   * 保留 Unicode 字母数字串（café 不拆开），缩写形式（don't）作为一个词，
   * 其余字符作为分隔符
   */
  words(text: string): string[] {
    if (!text || text.trim().length === 0) {
      return []
    }

    return (this.wordTokenizer.tokenize(text.toLowerCase()) ?? [])
      .filter((token) => token.length > 0)
  }

  /**
   * 把以缩写结尾的句子与下一句合并
   */
  private mergeAbbreviations(sentences: string[]): string[] {
    const merged: string[] = []
    let pending = ""

    sentences.forEach((sentence, index) => {
      const current = pending ? `${pending} ${sentence}` : sentence
      if (endsWithAbbreviation(current, sentences[index + 1])) {
        pending = current
      } else {
        merged.push(current)
        pending = ""
      }
    })

    if (pending) {
      merged.push(pending)
    }

    return merged
  }
}

function endsWithAbbreviation(sentence: string, next: string | undefined): boolean {
  const lastWord = sentence.split(/\s+/).pop() ?? ""
  if (!lastWord.endsWith(".")) {
    return false
  }

  const stem = lastWord.slice(0, -1).toLowerCase()
  if (NUMBER_ABBREVIATIONS.has(stem)) {
    return next !== undefined && /^\d/.test(next)
  }
  return ABBREVIATIONS.has(stem)
}
