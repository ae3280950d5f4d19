export { parseKeywords, sentimentTrend, summarizeRecords, toAnalysisRecord } from "./analysis-record"
export type {
  AnalysisRecord,
  RecordSummary,
  SentimentDistribution,
  TrendBucket,
  TrendPoint,
} from "@/types/records"
