import type { ReportWriter } from '../report/report-writer.js';

/**
 * Entry produced by the directory walk
 */
export interface WalkEntry {
  path: string;
  name: string;
  type: 'file' | 'directory';
}

/**
 * One report entry: `path:line:text`, a bare path, or a `=== path ===` block
 */
export type ScanResult = string;

/**
 * How a section is searched, chosen from its command template
 */
export type SearchPlan =
  | { kind: 'content'; keywords: string[]; extensions: string[] }
  | { kind: 'locate-dump'; patterns: string[] }
  | { kind: 'locate'; extensions: string[]; files: string[] }
  | { kind: 'none' };

/**
 * State owned by a single run and shared by its sections
 */
export interface SweepContext {
  root: string;
  verbose: boolean;
  report: ReportWriter;
  /** Resolved example command per section name */
  examples: Map<string, string>;
}

/**
 * Outcome of executing one section
 */
export interface SectionOutcome {
  name: string;
  plan: SearchPlan;
  resolvedCommand: string;
  results: ScanResult[];
}

/**
 * Aggregated run summary
 */
export interface SweepSummary {
  outputPath: string;
  sectionsRun: number;
  totalResults: number;
  startTime: Date;
  endTime: Date;
}
