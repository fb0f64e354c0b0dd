import { formatFileStamp } from '../utils/timestamp.js';

/** Configuration file looked up in the working directory when none is given */
export const DEFAULT_CONFIG_FILE = 'file-sweep.config';

/** Line prefixes recognised inside a section */
export const CONFIG_KEYS = {
  command: 'Command: ',
  example: 'Example: ',
  keywords: 'Keywords: ',
  extensions: 'Extensions: ',
  files: 'Files: '
} as const;

/**
 * Default report path, named after the moment the run starts
 */
export function defaultOutputPath(now: Date = new Date()): string {
  return `findings_${formatFileStamp(now)}.txt`;
}
