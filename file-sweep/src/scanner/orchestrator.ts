import type { SweepOptions } from '../config/types.js';
import type { SectionOutcome, SweepContext, SweepSummary } from './types.js';
import { loadConfig } from '../config/config.js';
import { updateConfigFile } from '../config/rewriter.js';
import { ReportWriter } from '../report/report-writer.js';
import { executeSection } from './executor.js';
import { logger } from '../utils/logger.js';
import { formatTimestamp } from '../utils/timestamp.js';

const RULE = '='.repeat(40);

/**
 * Runs every section of a configuration against one root directory
 */
export class SweepOrchestrator {
  constructor(private readonly options: SweepOptions) {}

  /**
   * Executes the sweep. The configuration file is rewritten only after every
   * section has run; a failure before that leaves it untouched.
   */
  async run(): Promise<SweepSummary> {
    const { root, configPath, outputPath, verbose } = this.options;
    const startTime = new Date();
    const examples = new Map<string, string>();
    const outcomes: SectionOutcome[] = [];

    const report = await ReportWriter.create(outputPath, verbose);
    try {
      await report.write(`Starting search from: ${root}`);
      await report.write(`Config: ${configPath}`);
      await report.write(`Started: ${formatTimestamp(startTime)}`);
      await report.write(RULE);

      const sections = await loadConfig(configPath);
      logger.debug(`Loaded ${sections.length} sections from ${configPath}`);
      if (!sections.some(section => section.commandTemplate)) {
        logger.warn(`No section with a Command in ${configPath}`);
      }

      const context: SweepContext = { root, verbose, report, examples };
      for (const section of sections) {
        if (!section.commandTemplate) {
          logger.debug(`Skipping section without command: ${section.name}`);
          continue;
        }
        outcomes.push(await executeSection(section, context));
      }

      await report.write(`\n${RULE}`);
      await report.write(`Completed: ${formatTimestamp(new Date())}`);
    } finally {
      await report.close();
    }

    await updateConfigFile(configPath, examples);
    if (verbose) {
      logger.info('Config file updated with actual commands');
    }

    logger.success(`Results saved to: ${outputPath}`);

    return {
      outputPath,
      sectionsRun: outcomes.length,
      totalResults: outcomes.reduce((sum, outcome) => sum + outcome.results.length, 0),
      startTime,
      endTime: new Date()
    };
  }
}
