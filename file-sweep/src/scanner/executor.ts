import type { ScanSection } from '../config/types.js';
import type { ScanResult, SearchPlan, SectionOutcome, SweepContext } from './types.js';
import { planSearch, resolveCommand } from './plan.js';
import { locateAndDump, locateFiles, searchContent } from './searches.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

/**
 * Result stream for a plan
 */
export function runSearch(root: string, plan: SearchPlan): AsyncGenerator<ScanResult> | null {
  switch (plan.kind) {
    case 'content':
      return searchContent(root, plan.keywords, plan.extensions);
    case 'locate-dump':
      return locateAndDump(root, plan.patterns);
    case 'locate':
      return locateFiles(root, plan.extensions, plan.files);
    case 'none':
      return null;
  }
}

/**
 * Writes each result to the report as soon as the search yields it.
 * A failing search ends early, keeping whatever was found before it;
 * a failing report write propagates.
 */
async function streamResults(
  search: AsyncGenerator<ScanResult>,
  context: SweepContext
): Promise<ScanResult[]> {
  const results: ScanResult[] = [];

  for (;;) {
    let next: IteratorResult<ScanResult>;
    try {
      next = await search.next();
    } catch (error) {
      logger.debug(`Search stopped early under ${context.root}: ${errorMessage(error)}`);
      if (context.verbose) {
        await context.report.write(`Error during search: ${errorMessage(error)}`);
      }
      break;
    }

    if (next.done) {
      break;
    }
    results.push(next.value);
    try {
      await context.report.write(next.value);
    } catch (error) {
      await search.return(undefined);
      throw error;
    }
  }

  return results;
}

/**
 * Executes one section: records its resolved command, runs its search and
 * writes its block to the report
 */
export async function executeSection(
  section: ScanSection,
  context: SweepContext
): Promise<SectionOutcome> {
  const { report, verbose } = context;

  await report.write(`\n=== ${section.name} ===`);

  const plan = planSearch(section);
  const resolvedCommand = resolveCommand(section, plan);
  context.examples.set(section.name, resolvedCommand);

  if (verbose) {
    await report.write(`Command template: ${section.commandTemplate}`);
    if (section.keywords.length > 0) {
      await report.write(`Keywords: ${section.keywords.join(', ')}`);
    }
    if (section.extensions.length > 0) {
      await report.write(`Extensions: ${section.extensions.join(', ')}`);
    }
    if (section.files.length > 0) {
      await report.write(`Files: ${section.files.join(', ')}`);
    }
    await report.write('\n> Running search...');
  }

  const startedAt = Date.now();
  const search = runSearch(context.root, plan);
  const results = search ? await streamResults(search, context) : [];
  logger.debug(`${section.name}: ${plan.kind} search, ${results.length} results in ${Date.now() - startedAt}ms`);

  if (results.length === 0 && verbose) {
    await report.write('No matches found');
  }

  return { name: section.name, plan, resolvedCommand, results };
}
