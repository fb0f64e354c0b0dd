/**
 * One named rule block from the configuration file
 */
export interface ScanSection {
  /** Display label taken from the `[Name]` header */
  name: string;

  /** Command template; may contain the KEYWORDS, EXTENSIONS and FILES tokens */
  commandTemplate: string;

  /** Case-insensitive search terms, used by content searches */
  keywords: string[];

  /** Glob patterns matched against file names */
  extensions: string[];

  /** Glob patterns matched against file names, for exact-name style matches */
  files: string[];
}

/**
 * Options for a single sweep run
 */
export interface SweepOptions {
  /** Root directory to search from */
  root: string;

  /** Path of the configuration file (read, then rewritten with examples) */
  configPath: string;

  /** Path of the report file */
  outputPath: string;

  /** Write commands and metadata to the report and mirror it to the console */
  verbose: boolean;
}
