/**
 * Result of scanning a go.mod for library equivalents.
 */

export interface ScanTarget {
  crateName: string;
  url: string;
}

export interface ScanEntry {
  /** Go module path */
  path: string;
  version: string;
  /** Empty when the catalog has no equivalent */
  targets: ScanTarget[];
}

export interface ScanResult {
  module: string;
  goVersion: string;
  entries: ScanEntry[];
  /** Entries with at least one target */
  mappedCount: number;
}
