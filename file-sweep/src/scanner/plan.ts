import type { ScanSection } from '../config/types.js';
import type { SearchPlan } from './types.js';

/** Words in a command template that select the search mode */
export const SEARCH_MARKERS = {
  content: 'grep',
  locate: 'find',
  dump: '-exec cat'
} as const;

/** Placeholders substituted in the resolved command */
export const PLACEHOLDERS = {
  keywords: 'KEYWORDS',
  extensions: 'EXTENSIONS',
  files: 'FILES'
} as const;

/**
 * Chooses the search for a section. Content search wins over locate-and-dump,
 * which wins over a plain locate.
 */
export function planSearch(section: ScanSection): SearchPlan {
  const template = section.commandTemplate;

  if (template.includes(SEARCH_MARKERS.content)) {
    return { kind: 'content', keywords: section.keywords, extensions: section.extensions };
  }

  if (template.includes(SEARCH_MARKERS.locate) && template.includes(SEARCH_MARKERS.dump)) {
    const patterns = section.files.length > 0 ? section.files : section.extensions;
    return { kind: 'locate-dump', patterns };
  }

  if (template.includes(SEARCH_MARKERS.locate)) {
    return { kind: 'locate', extensions: section.extensions, files: section.files };
  }

  return { kind: 'none' };
}

function includeClauses(patterns: readonly string[]): string {
  return patterns.map(pattern => `--include="${pattern}"`).join(' ');
}

function nameClauses(patterns: readonly string[]): string {
  return `\\( ${patterns.map(pattern => `-name "${pattern}"`).join(' -o ')} \\)`;
}

function substitute(command: string, token: string, value: string): string {
  // Replacer function, so `$` sequences in the value stay literal
  return command.replaceAll(token, () => value);
}

/**
 * Builds the human-readable command recorded as a section's example.
 * Only documents the search; matching never reads it.
 */
export function resolveCommand(section: ScanSection, plan: SearchPlan): string {
  let command = section.commandTemplate;

  if (section.keywords.length > 0 && command.includes(PLACEHOLDERS.keywords)) {
    command = substitute(command, PLACEHOLDERS.keywords, section.keywords.join('|'));
  }

  if (section.extensions.length > 0 && command.includes(PLACEHOLDERS.extensions)) {
    switch (plan.kind) {
      case 'content':
        command = substitute(command, PLACEHOLDERS.extensions, includeClauses(section.extensions));
        break;
      case 'locate':
      case 'locate-dump':
        command = substitute(command, PLACEHOLDERS.extensions, nameClauses(section.extensions));
        break;
      case 'none':
        break;
    }
  }

  if (section.files.length > 0 && command.includes(PLACEHOLDERS.files)) {
    command = substitute(command, PLACEHOLDERS.files, nameClauses(section.files));
  }

  return command.replaceAll('\\\\', '\\');
}
