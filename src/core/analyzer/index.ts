/**
 * 内容分析模块
 *
 * 分词、统计、情感、关键词、摘要与图表的分析流水线
 */

export { ContentAnalyzer, contentAnalyzer, type ContentAnalyzerDeps } from "./ContentAnalyzer"
export { FrequencyTable, KeywordExtractor, type KeywordExtraction } from "./KeywordExtractor"
export {
  VaderSentimentScorer,
  sentimentConfidence,
  sentimentLabel,
  toSentimentReport,
  type SentimentScorer,
} from "./SentimentScorer"
export { computeReadability, computeStatistics, countSyllables, countWords, roundTo } from "./statistics"
export { Summarizer } from "./Summarizer"
export { Tokenizer } from "./Tokenizer"
export type {
  AnalysisFailure,
  AnalysisRequest,
  AnalysisResponse,
  AnalysisResult,
  RawSentimentScores,
  SentimentLabel,
  SentimentReport,
  TextStatistics,
  WordCount,
} from "@/types/analysis"
