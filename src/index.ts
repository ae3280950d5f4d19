export * from "./core/analyzer"
export * from "./core/charts"
export * from "./core/extractor"
export * from "./core/records"
export { DARK_THEME, DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig, type ChartTheme } from "./types/config"
export type { AnalysisStage, ChartKind, ChartSet, StageFailure } from "./types/analysis"
export { AppError, EmptyContentError, ErrorCode, handleSync, toAppError, type Result } from "./utils/errors"
export { logger, Logger } from "./utils/logger"
