export { ContentExtractor, contentExtractor, validateUrl } from "./ContentExtractor"
export type { ExtractorConfig, PageContent, PageExtraction } from "./types"
