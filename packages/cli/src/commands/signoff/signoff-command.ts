import { Command } from 'commander';
import { promises as fs } from 'fs';
import { Config, Git, Signoff, Utils } from '@dcoguard/core';
import { BaseCommand } from '../../base/base-command';
import type { ConfigCommandOptions } from '../../types/command-options';

export const PENDING_COMMIT_IDENTIFIER = 'pending';

/**
 * Signoff Command Options
 * Maps CLI flags to the match policy and commit source
 */
export interface SignoffCommandOptions extends ConfigCommandOptions {
  /** Revision range such as "origin/main..HEAD" */
  range?: string;
  /** Base ref of the pull request (default: origin/$GITHUB_BASE_REF) */
  base?: string;
  /** Head ref of the pull request (default: HEAD) */
  head?: string;
  /** Commit message file from a commit-msg hook */
  messageFile?: string;
  caseSensitiveEmail?: boolean;
  /** Set to false by --no-merge-exemption */
  mergeExemption?: boolean;
  anySignoff?: boolean;
  acceptCoAuthors?: boolean;
  allowEmpty?: boolean;
  /** Emit GitHub Actions annotations (default: on when GITHUB_ACTIONS=true) */
  annotate?: boolean;
}

type CommitSource =
  | { mode: 'pull-request'; range: string; base: string | undefined; head: string; commits: Signoff.CommitRecord[] }
  | { mode: 'commit-msg'; commits: Signoff.CommitRecord[] };

/**
 * Escapes a workflow command message (`%`, CR and LF).
 */
export function escapeAnnotation(message: string): string {
  return message.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function shortId(identifier: string): string {
  return identifier === PENDING_COMMIT_IDENTIFIER ? identifier : identifier.slice(0, 12);
}

/**
 * Signoff Command - Thin wrapper for the core Signoff module
 *
 * This command is responsible for:
 * - Reading commits (PR range) or the pending message (commit-msg hook)
 * - Merging CLI flags over `.dcoguard.yml`
 * - Formatting output (text, JSON, workflow annotations)
 * - Setting exit codes
 */
export class SignoffCommand extends BaseCommand<SignoffCommandOptions> {
  protected commandName = 'signoff';
  protected description = 'Check that commits carry a DCO sign-off matching their author';

  register(program: Command): void {
    program
      .command('signoff [range]')
      .description(this.description)
      .option('--base <ref>', 'Base ref of the pull request (default: origin/$GITHUB_BASE_REF)')
      .option('--head <ref>', 'Head ref of the pull request (default: HEAD)')
      .option('--message-file <path>', 'Validate a pending commit message (commit-msg hook)')
      .option('--case-sensitive-email', 'Compare sign-off emails case-sensitively')
      .option('--no-merge-exemption', 'Require sign-offs on merge commits too')
      .option('--any-signoff', 'Accept any well-formed sign-off, not only the author\'s')
      .option('--accept-co-authors', 'Accept sign-offs from Co-authored-by identities')
      .option('--allow-empty', 'Pass when the range holds no commits')
      .option('--annotate', 'Emit GitHub Actions error annotations')
      .option('-c, --config <path>', 'Config file (default: .dcoguard.yml at the repository root)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show sign-off details')
      .option('-q, --quiet', 'Only print failures')
      .action(async (range: string | undefined, options: SignoffCommandOptions) => {
        await this.execute({ ...options, ...(range ? { range } : {}) });
      });
  }

  /**
   * Execute signoff command. Calls process.exit exactly once.
   */
  async execute(options: SignoffCommandOptions): Promise<void> {
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

  private async run(options: SignoffCommandOptions): Promise<number> {
    const configManager = await this.container.getConfigManager(options.config);
    const settings = await configManager.getSignoffSettings(this.toOverrides(options));
    const gitModule = await this.container.getGitModule();

    const source = options.messageFile
      ? await this.readPendingCommit(gitModule, options.messageFile)
      : await this.readRange(gitModule, options);

    let results: Signoff.ValidationResult[];
    try {
      results = Signoff.validate(source.commits, settings.policy, source.mode);
    } catch (error) {
      if (error instanceof Signoff.InvalidInputError && source.mode === 'pull-request' && settings.allowEmptyRange) {
        return this.handleEmptyRange(source.range, options);
      }
      throw error;
    }
    const summary = Signoff.summarizeResults(results);

    if (options.json) {
      this.printJson(summary.failed === 0, {
        mode: source.mode,
        ...(source.mode === 'pull-request' ? { range: source.range } : {}),
        policy: settings.policy,
        summary,
        results,
      });
    } else {
      const rebaseBase = summary.failed > 0 && source.mode === 'pull-request' && source.base
        ? await this.findRebaseBase(gitModule, source.base, source.head)
        : undefined;
      this.printResults(results, summary, source, options, rebaseBase);
      if (options.annotate ?? process.env['GITHUB_ACTIONS'] === 'true') {
        this.printAnnotations(results);
      }
    }

    return summary.failed > 0 ? 1 : 0;
  }

  /**
   * Flags only ever tighten or loosen explicitly; an absent flag leaves
   * the config file value in place.
   */
  private toOverrides(options: SignoffCommandOptions): Config.SignoffConfig {
    return {
      ...(options.caseSensitiveEmail ? { caseInsensitiveEmail: false } : {}),
      ...(options.mergeExemption === false ? { allowMergeCommitsWithoutSignoff: false } : {}),
      ...(options.anySignoff ? { requireExactAuthorMatch: false } : {}),
      ...(options.acceptCoAuthors ? { acceptCoAuthorSignoffs: true } : {}),
      ...(options.allowEmpty ? { allowEmptyRange: true } : {}),
    };
  }

  private async readRange(gitModule: Git.GitModule, options: SignoffCommandOptions): Promise<CommitSource> {
    let range: string;
    let base: string | undefined;
    let head: string;

    if (options.range) {
      range = options.range;
      ({ base, head } = Git.parseRange(range));
    } else {
      const baseRef = process.env['GITHUB_BASE_REF'];
      base = options.base ?? (baseRef ? `origin/${baseRef}` : undefined);
      if (!base) {
        throw new Error('No commit range: pass a range, --base <ref>, or --message-file <path>');
      }
      head = options.head ?? 'HEAD';
      range = `${base}..${head}`;
    }

    const commits = await gitModule.getCommitRecords(range);
    return { mode: 'pull-request', range, base, head, commits };
  }

  /**
   * Where `git rebase --signoff` should start so that it rewrites only the
   * range's own commits. Falls back to the base ref when the two ends share
   * no history.
   */
  private async findRebaseBase(gitModule: Git.GitModule, base: string, head: string): Promise<string> {
    try {
      return await gitModule.getMergeBase(base, head);
    } catch (error) {
      if (error instanceof Git.GitCommandError) {
        return base;
      }
      throw error;
    }
  }

  private async readPendingCommit(gitModule: Git.GitModule, messageFile: string): Promise<CommitSource> {
    const raw = await fs.readFile(messageFile, 'utf-8');
    const author = await gitModule.getAuthorIdentity();

    return {
      mode: 'commit-msg',
      commits: [{
        identifier: PENDING_COMMIT_IDENTIFIER,
        message: Signoff.cleanCommitMessage(raw),
        authorName: author.name,
        authorEmail: author.email,
      }],
    };
  }

  private handleEmptyRange(range: string, options: SignoffCommandOptions): number {
    if (options.json) {
      this.printJson(true, {
        mode: 'pull-request',
        range,
        summary: { total: 0, passed: 0, failed: 0, exempted: 0 },
        results: [],
      });
    } else if (!options.quiet) {
      this.logger.warn(`⚠️  No commits in ${range}, nothing to check`);
    }
    return 0;
  }

  private printResults(
    results: Signoff.ValidationResult[],
    summary: Signoff.SignoffSummary,
    source: CommitSource,
    options: SignoffCommandOptions,
    rebaseBase?: string
  ): void {
    const quiet = options.quiet || false;

    for (const result of results) {
      const id = shortId(result.commitIdentifier);
      if (!result.passed) {
        this.logger.log(`❌ ${id} ${result.reason ?? Signoff.NO_SIGNOFF_REASON}`);
      } else if (!quiet) {
        this.logger.log(result.exemption ? `✅ ${id} merge commit, sign-off not required` : `✅ ${id}`);
      }

      if (quiet) {
        continue;
      }
      for (const line of result.malformedTrailers) {
        this.logger.log(`   ⚠️  malformed trailer: ${line}`);
      }
      if (options.verbose) {
        for (const signoff of result.signoffs) {
          this.logger.log(`   signed off by ${Signoff.formatIdentity(signoff)}`);
        }
      }
    }

    if (summary.failed === 0) {
      if (!quiet) {
        const exempted = summary.exempted > 0 ? ` (${summary.exempted} exempted)` : '';
        this.logger.log(`✅ All ${summary.total} commit(s) pass the DCO check${exempted}`);
      }
      return;
    }

    this.logger.log(`❌ ${summary.failed} of ${summary.total} commit(s) failed the DCO check`);
    if (quiet) {
      return;
    }
    if (source.mode === 'commit-msg') {
      this.logger.log('💡 Sign off your commit with: git commit -s');
      return;
    }
    this.logger.log('💡 Sign off the last commit with: git commit --amend -s --no-edit');
    if (rebaseBase) {
      this.logger.log(`💡 Sign off every commit in the range with: git rebase --signoff ${rebaseBase}`);
    }
  }

  private printAnnotations(results: Signoff.ValidationResult[]): void {
    for (const result of results) {
      if (result.passed) {
        continue;
      }
      const message = `Commit ${shortId(result.commitIdentifier)}: ${result.reason ?? Signoff.NO_SIGNOFF_REASON}`;
      this.logger.log(`::error title=DCO::${escapeAnnotation(message)}`);
    }
  }
}
