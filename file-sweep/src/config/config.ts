import fs from 'fs/promises';
import path from 'path';
import type { ScanSection } from './types.js';
import { CONFIG_KEYS, DEFAULT_CONFIG_FILE } from './defaults.js';

/**
 * Splits a comma-separated list, trimming each element
 */
export function parseList(value: string): string[] {
  if (!value) {
    return [];
  }
  return value.split(',').map(item => item.trim());
}

/**
 * Returns the section name if the line is a `[Name]` header
 */
export function parseSectionHeader(line: string): string | null {
  if (line.startsWith('[') && line.endsWith(']')) {
    return line.slice(1, -1);
  }
  return null;
}

function emptySection(name: string): ScanSection {
  return {
    name,
    commandTemplate: '',
    keywords: [],
    extensions: [],
    files: []
  };
}

/**
 * Parses configuration text into its sections, in file order.
 * Unknown lines are ignored, as are key lines that appear before the first header.
 */
export function parseConfig(text: string): ScanSection[] {
  const sections: ScanSection[] = [];
  let current: ScanSection | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trimEnd();

    if (!line || line.startsWith('#')) {
      continue;
    }

    const header = parseSectionHeader(line);
    if (header !== null) {
      if (current) {
        sections.push(current);
      }
      current = emptySection(header);
      continue;
    }

    if (!current) {
      continue;
    }

    if (line.startsWith(CONFIG_KEYS.command)) {
      current.commandTemplate = line.slice(CONFIG_KEYS.command.length).trim();
    } else if (line.startsWith(CONFIG_KEYS.example)) {
      // Regenerated after every run
      continue;
    } else if (line.startsWith(CONFIG_KEYS.keywords)) {
      current.keywords = parseList(line.slice(CONFIG_KEYS.keywords.length));
    } else if (line.startsWith(CONFIG_KEYS.extensions)) {
      current.extensions = parseList(line.slice(CONFIG_KEYS.extensions.length));
    } else if (line.startsWith(CONFIG_KEYS.files)) {
      current.files = parseList(line.slice(CONFIG_KEYS.files.length));
    }
  }

  if (current) {
    sections.push(current);
  }

  return sections;
}

/**
 * Loads and parses a configuration file
 * @param configPath - Path to the configuration file
 * @returns Sections in file order
 */
export async function loadConfig(configPath: string): Promise<ScanSection[]> {
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    return parseConfig(content);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @returns Path to configuration file
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  return path.resolve(DEFAULT_CONFIG_FILE);
}
