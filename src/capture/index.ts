/**
 * Capture boundary: where metadata records come from.
 */

export type { MetadataSource, PartialCapture, SourceEntry } from './interface.js';
export { ExportFileSource } from './export-file.js';
export type { ExportFileSourceOptions } from './export-file.js';
export {
  analyzeCoverage,
  SCREENSHOT_TABS,
  NO_REVISIONS_REASON,
} from './coverage.js';
export type { CoverageReport, CoveredFile, ScreenshotQueueItem } from './coverage.js';
