export {
  ANALYSIS_SECTIONS,
  DOCUMENT_CONTENT_LABEL,
  truncateDocument,
  buildAnalysisPrompt,
} from './analysis.js';
export type { TruncatedText } from './analysis.js';
