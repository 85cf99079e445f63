export {
  writeReport,
  formatReport,
  reportFileName,
  compactTimestamp,
  displayTimestamp,
} from './writer.js';
export type { ReportOptions } from './writer.js';
