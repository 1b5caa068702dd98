import { Command } from 'commander';
import { Utils } from '@dcoguard/core';
import type { Headers } from '@dcoguard/core';
import { BaseCommand } from '../../base/base-command';
import type { ConfigCommandOptions } from '../../types/command-options';

/**
 * Headers Command Options
 */
export interface HeadersCommandOptions extends ConfigCommandOptions {
  /** Files or glob patterns (default: `headers.include` from the config) */
  files?: string[];
  /** Insert missing headers instead of reporting them */
  fix?: boolean;
  /** SPDX license identifier override */
  license?: string;
  /** Copyright notice override */
  copyright?: string;
}

/**
 * Headers Command - Thin wrapper for the core Headers module
 *
 * Exits 1 when a file lacks a header, could not be read, or (with --fix)
 * was modified, so pre-commit re-stages the change.
 */
export class HeadersCommand extends BaseCommand<HeadersCommandOptions> {
  protected commandName = 'headers';
  protected description = 'Check or add SPDX license headers';

  register(program: Command): void {
    program
      .command('headers [files...]')
      .description(this.description)
      .option('--fix', 'Insert missing headers')
      .option('-l, --license <id>', 'SPDX license identifier (default: Apache-2.0)')
      .option('--copyright <notice>', 'Copyright notice, e.g. "(C) 2025, Example contributors."')
      .option('-c, --config <path>', 'Config file (default: .dcoguard.yml at the repository root)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Only print problems')
      .action(async (files: string[], options: HeadersCommandOptions) => {
        await this.execute({ ...options, files });
      });
  }

  /**
   * Execute headers command. Calls process.exit exactly once.
   */
  async execute(options: HeadersCommandOptions): Promise<void> {
    let exitCode: number;
    try {
      exitCode = await this.run(options);
    } catch (error) {
      const message = Utils.errorMessage(error);
      this.handleError(message, options, error instanceof Error ? error : undefined);
      return;
    }
    process.exit(exitCode);
  }

  private async run(options: HeadersCommandOptions): Promise<number> {
    const configManager = await this.container.getConfigManager(options.config);
    const settings = await configManager.getHeaderSettings({
      ...(options.license ? { licenseId: options.license } : {}),
      ...(options.copyright ? { copyrightNotice: options.copyright } : {}),
    });
    const headerModule = await this.container.getHeaderModule();

    const selection: Headers.HeaderSelection = {
      patterns: options.files && options.files.length > 0 ? options.files : settings.include,
      exclude: settings.exclude,
    };

    if (options.fix) {
      const report = await headerModule.fix(selection, settings.policy);
      const failed = report.modified.length > 0 || report.errors.length > 0;
      if (options.json) {
        this.printJson(!failed, report);
      } else {
        this.printFixReport(report, options.quiet || false);
      }
      return failed ? 1 : 0;
    }

    const report = await headerModule.check(selection, settings.policy);
    const failed = report.missing.length > 0 || report.errors.length > 0;
    if (options.json) {
      this.printJson(!failed, report);
    } else {
      this.printCheckReport(report, settings.policy.licenseId, options.quiet || false);
    }
    return failed ? 1 : 0;
  }

  private printCheckReport(report: Headers.HeaderCheckReport, licenseId: string, quiet: boolean): void {
    for (const filePath of report.missing) {
      this.logger.log(`❌ ${filePath}: missing SPDX header (${licenseId})`);
    }
    this.printErrors(report.errors);

    const problems = report.missing.length + report.errors.length;
    if (problems > 0) {
      this.logger.log(`❌ ${problems} of ${report.checked.length} file(s) need attention`);
      if (!quiet) {
        this.logger.log('💡 Add the missing headers with: dcoguard headers --fix');
      }
    } else if (!quiet) {
      this.logger.log(`✅ ${report.checked.length} file(s) carry the SPDX header`);
    }
  }

  private printFixReport(report: Headers.HeaderFixReport, quiet: boolean): void {
    for (const filePath of report.modified) {
      this.logger.log(`🔧 ${filePath}: header added`);
    }
    this.printErrors(report.errors);

    if (report.modified.length > 0 && !quiet) {
      this.logger.log(`✅ Added headers to ${report.modified.length} file(s); review and stage them`);
    } else if (report.modified.length === 0 && report.errors.length === 0 && !quiet) {
      this.logger.log('✅ No file needed a header');
    }
  }

  private printErrors(errors: Headers.HeaderFileError[]): void {
    for (const error of errors) {
      this.logger.log(`❌ ${error.filePath}: ${error.message}`);
    }
  }
}
