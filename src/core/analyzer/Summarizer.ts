/**
 * 抽取式摘要
 *
 * 按位置选句：不超过 3 句时返回原文，否则取首句、中间句、末句
 */
export class Summarizer {
  constructor(private readonly fallbackLength: number = 500) {}

  summarize(content: string, sentences: readonly string[]): string {
    if (sentences.length <= 3) {
      return content
    }

    const middle = sentences[Math.floor(sentences.length / 2)]
    const first = sentences[0]
    const last = sentences[sentences.length - 1]

    return [first, middle, last].join(" ")
  }

  /**
   * 摘要失败时的降级结果：超长时截断并追加省略号
   */
  fallback(content: string): string {
    return content.length > this.fallbackLength
      ? `${content.slice(0, this.fallbackLength)}...`
      : content
  }
}
