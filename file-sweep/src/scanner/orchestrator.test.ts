import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { SweepOrchestrator } from './orchestrator.js';
import { ReportWriter } from '../report/report-writer.js';

const RULE = '='.repeat(40);
const TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

const CONFIG = [
  '# Sweep rules',
  '[Secrets]',
  'Command: grep -rniE "KEYWORDS" EXTENSIONS .',
  'Example: none yet',
  'Keywords: secret, token',
  'Extensions: *.env',
  '',
  '[Draft]',
  'Example: keep me',
  'Keywords: unused',
  '',
  '[Backups]',
  'Command: find . -type f EXTENSIONS',
  'Example: none yet',
  'Extensions: *.bak',
  ''
].join('\n');

describe('SweepOrchestrator', () => {
  let tempDir: string;
  let root: string;
  let configPath: string;
  let outputPath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-sweep-orchestrator-test-'));
    root = path.join(tempDir, 'tree');
    configPath = path.join(tempDir, 'file-sweep.config');
    outputPath = path.join(tempDir, 'out', 'findings.txt');

    await fs.mkdir(path.join(root, 'a', 'b'), { recursive: true });
    await fs.writeFile(path.join(root, 'app.env'), '# env\nexport TOKEN=abc\n');
    await fs.writeFile(path.join(root, 'a', 'b', 'config.bak'), 'old');
    await fs.writeFile(configPath, CONFIG);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write a report with header, section blocks and footer', async () => {
    const orchestrator = new SweepOrchestrator({ root, configPath, outputPath, verbose: false });

    const summary = await orchestrator.run();

    const lines = (await fs.readFile(outputPath, 'utf-8')).split('\n');
    expect(lines.slice(0, 2)).toEqual([`Starting search from: ${root}`, `Config: ${configPath}`]);
    expect(lines[2].replace('Started: ', '')).toMatch(TIMESTAMP);
    expect(lines.slice(3, 12)).toEqual([
      RULE,
      '',
      '=== Secrets ===',
      `${path.join(root, 'app.env')}:2:export TOKEN=abc`,
      '',
      '=== Backups ===',
      path.join(root, 'a', 'b', 'config.bak'),
      '',
      RULE
    ]);
    expect(lines[12].replace('Completed: ', '')).toMatch(TIMESTAMP);
    expect(lines).toHaveLength(14);
    expect(summary.sectionsRun).toBe(2);
    expect(summary.totalResults).toBe(2);
    expect(summary.outputPath).toBe(outputPath);
  });

  it('should rewrite only the Example lines of executed sections', async () => {
    await new SweepOrchestrator({ root, configPath, outputPath, verbose: false }).run();

    const expected = CONFIG
      .replace('Example: none yet', 'Example: grep -rniE "secret|token" --include="*.env" .')
      .replace('Example: none yet', 'Example: find . -type f \\( -name "*.bak" \\)');
    expect(await fs.readFile(configPath, 'utf-8')).toBe(expected);
  });

  it('should only print the saved-to line when quiet', async () => {
    await new SweepOrchestrator({ root, configPath, outputPath, verbose: false }).run();

    const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain(`Results saved to: ${outputPath}`);
  });

  it('should mirror the report to the console when verbose', async () => {
    await new SweepOrchestrator({ root, configPath, outputPath, verbose: true }).run();

    const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
    expect(printed).toContain('\n=== Secrets ===');
    expect(printed).toContain('Command template: find . -type f EXTENSIONS');
    expect(printed).toContain('Config file updated with actual commands');
  });

  it('should leave the configuration untouched when a run fails part way', async () => {
    const originalWrite = ReportWriter.prototype.write;
    vi.spyOn(ReportWriter.prototype, 'write').mockImplementation(function (
      this: ReportWriter,
      message: string,
      toConsole?: boolean
    ) {
      if (message === '\n=== Backups ===') {
        return Promise.reject(new Error('interrupted'));
      }
      return originalWrite.call(this, message, toConsole);
    });

    const orchestrator = new SweepOrchestrator({ root, configPath, outputPath, verbose: false });

    await expect(orchestrator.run()).rejects.toThrow('interrupted');
    expect(await fs.readFile(configPath, 'utf-8')).toBe(CONFIG);
    const report = await fs.readFile(outputPath, 'utf-8');
    expect(report).toContain(`${path.join(root, 'app.env')}:2:export TOKEN=abc`);
  });
});
