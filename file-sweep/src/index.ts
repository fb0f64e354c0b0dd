#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { fileSweep } from './file-sweep.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/fs-utils.js';

interface SweepFlags {
  config?: string;
  root: string;
  output?: string;
  verbose: boolean;
  debug: boolean;
}

const sweepCommand = buildCommand({
  docs: {
    brief: 'Recursively search a directory for sensitive files and keywords described by a config file',
    fullDescription: [
      'Config file format:',
      '',
      '  [Section Name]',
      '  Command: command with KEYWORDS, EXTENSIONS and FILES placeholders',
      '  Example: resolved command (rewritten after every run)',
      '  Keywords: keyword1, keyword2',
      '  Extensions: *.ext1, *.ext2',
      '  Files: file1, file2',
      '',
      'A command containing "grep" searches file contents for the keywords.',
      'One containing "find" locates files by name, and with "-exec cat" also dumps their contents.',
      '',
      'Without --verbose only matches are written to the report.'
    ].join('\n')
  },
  parameters: {
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to config file (default: ./file-sweep.config)',
        parse: String,
        optional: true
      },
      root: {
        kind: 'parsed',
        brief: 'Root directory to search from',
        parse: String
      },
      output: {
        kind: 'parsed',
        brief: 'Path to output file (default: findings_YYYYMMDD_HHMMSS.txt)',
        parse: String,
        optional: true
      },
      verbose: {
        kind: 'boolean',
        brief: 'Write commands and metadata to the report and the console',
        default: false
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      r: 'root',
      o: 'output',
      v: 'verbose',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: SweepFlags): Promise<void> {
    process.once('SIGINT', () => {
      logger.error('\n\nScan interrupted by user');
      process.exit(1);
    });

    try {
      await fileSweep({
        root: flags.root,
        configPath: flags.config,
        outputPath: flags.output,
        verbose: flags.verbose,
        debug: flags.debug
      });
    } catch (error) {
      logger.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  }
});

// No versionInfo: -v is taken by --verbose
const app = buildApplication(sweepCommand, {
  name: 'file-sweep'
});

run(app, process.argv.slice(2), { process });
