import fs from 'fs/promises';
import { CONFIG_KEYS } from './defaults.js';
import { parseSectionHeader } from './config.js';

/**
 * Replaces the `Example:` line of every section that has a resolved command.
 * All other lines, line endings included, are returned unchanged.
 */
export function rewriteExamples(text: string, examples: ReadonlyMap<string, string>): string {
  let currentSection: string | null = null;

  const lines = text.split('\n').map(rawLine => {
    const line = rawLine.trimEnd();

    const header = parseSectionHeader(line);
    if (header !== null) {
      currentSection = header;
      return rawLine;
    }

    if (line.startsWith(CONFIG_KEYS.example) && currentSection !== null) {
      const example = examples.get(currentSection);
      if (example !== undefined) {
        const lineEnding = rawLine.endsWith('\r') ? '\r' : '';
        return `${CONFIG_KEYS.example}${example}${lineEnding}`;
      }
    }

    return rawLine;
  });

  return lines.join('\n');
}

/**
 * Writes the resolved example commands back into the configuration file
 */
export async function updateConfigFile(
  configPath: string,
  examples: ReadonlyMap<string, string>
): Promise<void> {
  const original = await fs.readFile(configPath, 'utf-8');
  await fs.writeFile(configPath, rewriteExamples(original, examples), 'utf-8');
}
