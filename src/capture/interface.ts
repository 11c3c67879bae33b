/**
 * Capture Source Interface
 *
 * A source is the bridge between metaseal and a storage provider: it lists
 * what can be captured and returns metadata records for chosen files.
 * Sources must be read-only; nothing here may modify a remote file.
 */

import type { MetadataRecord } from '../integrity/types.js';
import type { SideMetadata } from '../matching/types.js';

/**
 * A listed file, as offered to name resolution.
 */
export interface SourceEntry {
  id: string;
  name: string;
  /** Attributes shown to the user and used by metadata strategies */
  side: SideMetadata;
}

export interface MetadataSource {
  /** Short identifier, e.g. "export-file" */
  readonly id: string;

  /** List every file the source can capture, in provider order. */
  listCandidates(): Promise<SourceEntry[]>;

  /**
   * Capture current metadata for the given ids, in the same order.
   * Throws if an id is unknown to the source.
   */
  capture(ids: ReadonlyArray<string>): Promise<MetadataRecord[]>;

  /**
   * Capture what is still there. Ids the source no longer knows are
   * returned in `missing` instead of failing the capture.
   */
  captureAvailable(ids: ReadonlyArray<string>): Promise<PartialCapture>;
}

export interface PartialCapture {
  /** Records of the ids still present, in request order */
  records: MetadataRecord[];
  missing: string[];
}
