/**
 * Capture Coverage
 *
 * Finds captured files whose revision history was not available from the
 * provider. Those files need their Details and Activity panels photographed,
 * so they are queued for screenshot capture.
 */

import type { MetadataRecord } from '../integrity/types.js';

export const SCREENSHOT_TABS = ['Details', 'Activity'] as const;

export const NO_REVISIONS_REASON = 'No revisions accessible via API';

export interface CoveredFile {
  id: string;
  name: string;
  revisions: number;
  comments: number;
  permissions: number;
}

export interface ScreenshotQueueItem {
  file_id: string;
  file_name: string;
  reason: string;
  comment_count: number;
  permission_count: number;
  screenshot_tabs: string[];
}

export interface CoverageReport {
  totalFiles: number;
  withRevisions: CoveredFile[];
  needsScreenshots: ScreenshotQueueItem[];
}

/**
 * Split captured records by whether revision history was captured.
 */
export function analyzeCoverage(records: ReadonlyArray<MetadataRecord>): CoverageReport {
  const withRevisions: CoveredFile[] = [];
  const needsScreenshots: ScreenshotQueueItem[] = [];

  for (const record of records) {
    const id = readText(record.id) ?? readText(record.file_id) ?? 'unknown';
    const name = readText(record.name) ?? 'Unknown';
    const revisions = countOf(record.revision_count, record.revisions);
    const comments = countOf(record.comment_count, record.comments);
    const permissions = countOf(record.permission_count, record.permissions);

    if (revisions > 0) {
      withRevisions.push({ id, name, revisions, comments, permissions });
    } else {
      needsScreenshots.push({
        file_id: id,
        file_name: name,
        reason: NO_REVISIONS_REASON,
        comment_count: comments,
        permission_count: permissions,
        screenshot_tabs: [...SCREENSHOT_TABS],
      });
    }
  }

  return { totalFiles: records.length, withRevisions, needsScreenshots };
}

/** The larger of the reported count and the captured list's length. */
function countOf(count: unknown, list: unknown): number {
  const reported = typeof count === 'number' && Number.isFinite(count) ? count : 0;
  return Math.max(reported, Array.isArray(list) ? list.length : 0);
}

function readText(value: unknown): string | null {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return null;
}
