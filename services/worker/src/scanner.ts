import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parseViolationReport, Scanner, Violation } from '@fixgate/domain';

import { ProcessRunner, runProcess } from './exec.js';

export interface ReportScannerOptions {
  projectRoot: string;
  /** Report location, relative to the project root. */
  reportPath: string;
  /** Shell command that regenerates the report; when absent the existing report is read. */
  command?: string;
  timeoutMs?: number;
  run?: ProcessRunner;
  read?: (filePath: string) => Promise<string>;
}

/**
 * Re-runs the governance scan and reads its JSON report. The report may be a
 * bare list of engine records or an object of per-engine result lists.
 */
export class ReportScanner implements Scanner {
  private readonly run: ProcessRunner;
  private readonly read: (filePath: string) => Promise<string>;

  constructor(private readonly options: ReportScannerOptions) {
    this.run = options.run ?? runProcess;
    this.read = options.read ?? ((filePath) => readFile(filePath, 'utf8'));
  }

  async scan(): Promise<Violation[]> {
    if (this.options.command) {
      await this.run('sh', ['-c', this.options.command], {
        cwd: this.options.projectRoot,
        timeoutMs: this.options.timeoutMs
      });
    }

    const reportFile = path.resolve(this.options.projectRoot, this.options.reportPath);
    const raw = await this.read(reportFile);

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid scan report ${this.options.reportPath}: ${reason}`);
    }

    return parseViolationReport(parsed);
  }
}
