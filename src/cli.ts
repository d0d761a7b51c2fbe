#!/usr/bin/env node
/**
 * CLI entry point for story-autopilot
 *
 * Commands:
 * - start <story_id>: branch, review pack, state and optional tracker issue + PR
 * - evidence <story_id>: optional local validations, then the PR evidence comment
 *
 * Exit codes:
 * - 0: Success
 * - 1: Any failure, reported as `ERROR: <message>` on stderr
 */

import * as path from 'path';
import { Command, CommanderError } from 'commander';
import { Autopilot } from './index';
import type { Environment } from './components/config-loader';
import { UnknownProviderError } from './errors';
import { PROVIDER_SELECTORS } from './types';
import type { EvidenceResult, ProviderReference, ProviderSelector, StartResult } from './types';
import { toPosix } from './components/story-locator';
import { logger } from './utils/logger';
import { sanitizeForLogging } from './utils/sanitize';

export const DEFAULT_STORIES_DIR = 'artifacts/stories';
export const DEFAULT_TESTS_ROOT = '.';

export type AutopilotCommands = Pick<Autopilot, 'start' | 'evidence' | 'repoRoot'>;

export interface CliDependencies {
  readonly env: Environment;
  readonly cwd: string;
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly createAutopilot: (cwd: string, env: Environment) => Promise<AutopilotCommands>;
}

interface StartCommandOptions {
  storiesDir: string;
  provider: ProviderSelector;
  baseBranch?: string;
  draft?: boolean;
  dryRun?: boolean;
  allowUntracked?: boolean;
  commit?: boolean;
  push?: boolean;
  requireIntegration?: boolean;
  githubToken?: string;
  githubRepo?: string;
  githubApiUrl?: string;
  azurePat?: string;
  azureOrgUrl?: string;
  azureProject?: string;
  azureRepo?: string;
  azureWorkItemType?: string;
}

interface EvidenceCommandOptions {
  storiesDir: string;
  testsRoot: string;
  runLocal?: boolean;
  fullVerify?: boolean;
  dryRun?: boolean;
  githubToken?: string;
  azurePat?: string;
}

/**
 * @throws {UnknownProviderError} If the value is not auto, github or azuredevops
 */
export function parseProviderSelector(value: string): ProviderSelector {
  const selector = PROVIDER_SELECTORS.find((candidate) => candidate === value);
  if (!selector) {
    throw new UnknownProviderError(value);
  }
  return selector;
}

function describeReference(reference: ProviderReference): string[] {
  if (reference.kind === 'github') {
    return [
      `github issue: #${reference.issue.number} ${reference.issue.htmlUrl}`,
      `github PR: #${reference.pr.number} ${reference.pr.htmlUrl}`
    ];
  }
  return [
    `azuredevops work item: ${reference.workItem.id} ${reference.workItem.url}`,
    `azuredevops PR: ${reference.pr.id} ${reference.pr.url}`
  ];
}

/**
 * Human summary printed after `start`; paths are relative to the repository root
 */
export function formatStartSummary(result: StartResult, repoRoot: string): string[] {
  const lines = [
    `Story: ${result.workItem.id}: ${result.workItem.title}`,
    `Branch: ${result.branch}`,
    `Review pack: ${toPosix(path.relative(repoRoot, result.reviewPackPath))}`,
    `State: ${toPosix(path.relative(repoRoot, result.statePath))}`
  ];

  if (result.reference) {
    lines.push(...describeReference(result.reference));
  }

  return lines;
}

export function formatEvidenceSummary(result: EvidenceResult): string {
  return result.provider === 'github'
    ? `Updated GitHub PR comment for PR #${result.pullRequest}`
    : `Posted Azure DevOps PR thread comment for PR ${result.pullRequest}`;
}

export function buildProgram(dependencies: CliDependencies): Command {
  const program = new Command();

  program
    .name('story-autopilot')
    .description('Story -> branch -> pull request -> evidence')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => dependencies.stdout(text.trimEnd()),
      writeErr: (text) => dependencies.stderr(text.trimEnd()),
      outputError: () => undefined
    });

  program
    .command('start')
    .description('Create the branch, review pack and state, and open the tracker issue and PR')
    .argument('<story_id>', 'Story id (e.g. ACF-0123)')
    .option('--stories-dir <dir>', 'Stories directory', DEFAULT_STORIES_DIR)
    .option('--provider <provider>', 'auto, github or azuredevops', parseProviderSelector, 'auto')
    .option('--base-branch <branch>', 'Base branch (default: AUTOPILOT_BASE_BRANCH or main)')
    .option('--draft', 'Create a draft pull request')
    .option('--dry-run', 'Write local artifacts only; no git changes or network calls')
    .option('--allow-untracked', 'Tolerate untracked files in the working tree')
    .option('--commit', 'Commit the generated artifacts')
    .option('--push', 'Push the branch to origin (implies --commit)')
    .option('--require-integration', 'Fail when provider settings are incomplete')
    .option('--github-token <token>', 'GitHub token (default: GITHUB_TOKEN or GH_TOKEN)')
    .option('--github-repo <repo>', 'owner/name (default: GITHUB_REPOSITORY or origin)')
    .option('--github-api-url <url>', 'GitHub API base (default: https://api.github.com)')
    .option('--azure-pat <pat>', 'Azure DevOps PAT (default: AZURE_DEVOPS_PAT)')
    .option('--azure-org-url <url>', 'e.g. https://dev.azure.com/yourorg')
    .option('--azure-project <project>', 'Azure DevOps project')
    .option('--azure-repo <repo>', 'Azure Repos repository name')
    .option('--azure-work-item-type <type>', 'Work item type (default: User Story)')
    .action(async (storyId: string, options: StartCommandOptions) => {
      const autopilot = await dependencies.createAutopilot(dependencies.cwd, dependencies.env);
      const push = options.push === true;

      const result = await autopilot.start({
        storyId,
        storiesDir: options.storiesDir,
        provider: options.provider,
        baseBranch: options.baseBranch,
        draft: options.draft === true,
        dryRun: options.dryRun === true,
        allowUntracked: options.allowUntracked === true,
        commit: push || options.commit === true,
        push,
        requireIntegration: options.requireIntegration === true,
        credentials: {
          githubToken: options.githubToken,
          githubRepo: options.githubRepo,
          githubApiUrl: options.githubApiUrl,
          azurePat: options.azurePat,
          azureOrgUrl: options.azureOrgUrl,
          azureProject: options.azureProject,
          azureRepo: options.azureRepo,
          azureWorkItemType: options.azureWorkItemType
        }
      });

      for (const line of formatStartSummary(result, autopilot.repoRoot)) {
        dependencies.stdout(line);
      }
    });

  program
    .command('evidence')
    .description('Run local checks and post or update the PR evidence comment')
    .argument('<story_id>', 'Story id (e.g. ACF-0123)')
    .option('--stories-dir <dir>', 'Stories directory', DEFAULT_STORIES_DIR)
    .option('--tests-root <dir>', 'Root directory scanned for tests', DEFAULT_TESTS_ROOT)
    .option('--run-local', 'Run local validations before posting evidence')
    .option('--full-verify', 'Also run scripts/scaffold-and-verify.sh')
    .option('--dry-run', 'Skip the network call')
    .option('--github-token <token>', 'GitHub token (default: GITHUB_TOKEN or GH_TOKEN)')
    .option('--azure-pat <pat>', 'Azure DevOps PAT (default: AZURE_DEVOPS_PAT)')
    .action(async (storyId: string, options: EvidenceCommandOptions) => {
      const autopilot = await dependencies.createAutopilot(dependencies.cwd, dependencies.env);

      const result = await autopilot.evidence({
        storyId,
        storiesDir: options.storiesDir,
        testsRoot: options.testsRoot,
        runLocal: options.runLocal === true,
        fullVerify: options.fullVerify === true,
        dryRun: options.dryRun === true,
        credentials: {
          githubToken: options.githubToken,
          azurePat: options.azurePat
        }
      });

      dependencies.stdout(formatEvidenceSummary(result));
    });

  return program;
}

function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    createAutopilot: (cwd, env) => Autopilot.forWorkingDirectory(cwd, env)
  };
}

/**
 * Parses the arguments (without node and script path), runs the command and
 * returns the exit code; never rejects
 */
export async function run(
  argv: readonly string[],
  dependencies: CliDependencies = defaultDependencies()
): Promise<number> {
  const program = buildProgram(dependencies);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return 0;
      }
      const message =
        error.code === 'commander.help'
          ? 'a command is required (start or evidence)'
          : error.message.replace(/^error:\s*/, '');
      dependencies.stderr(`ERROR: ${sanitizeForLogging(message)}`);
      return 1;
    }

    const sanitizedError = sanitizeForLogging(error);
    logger.error('Command failed', { error: sanitizedError });
    dependencies.stderr(`ERROR: ${sanitizedError}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exit(code);
    },
    (error: unknown) => {
      console.error(`ERROR: ${sanitizeForLogging(error)}`);
      process.exit(1);
    }
  );
}
