import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';

/**
 * Append-only report file. Every message is written as soon as it arrives,
 * so an interrupted run keeps everything reported up to that point.
 */
export class ReportWriter {
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
    readonly verbose: boolean
  ) {}

  /**
   * Creates (or truncates) the report, creating missing parent directories
   */
  static async create(outputPath: string, verbose: boolean): Promise<ReportWriter> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    const handle = await fs.open(outputPath, 'w');
    return new ReportWriter(handle, outputPath, verbose);
  }

  /**
   * Appends a line to the report, mirroring it to the console in verbose mode
   * unless told otherwise
   */
  async write(message: string, toConsole: boolean = this.verbose): Promise<void> {
    if (this.closed) {
      throw new Error(`Report already closed: ${this.path}`);
    }
    if (toConsole) {
      logger.info(message);
    }
    await this.handle.write(`${message}\n`);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}
