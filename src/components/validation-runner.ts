/**
 * Validation Runner - local checks executed before evidence is posted
 *
 * Every command is best-effort: a failing or missing command is recorded and
 * the next one still runs.
 */

import { spawn } from 'child_process';
import { logger } from '../utils/logger';
import { sanitizeString } from '../utils/sanitize';

export interface ValidationCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface ValidationRunOptions {
  readonly storiesDir: string;
  readonly testsRoot: string;
  readonly fullVerify: boolean;
}

export interface CommandResult {
  readonly commandLine: string;
  readonly exitCode: number | null;
  readonly success: boolean;
  readonly duration: number;
  readonly error?: string;
}

export function buildValidationCommands(options: ValidationRunOptions): ValidationCommand[] {
  const commands: ValidationCommand[] = [
    { command: 'git', args: ['status'] },
    { command: 'bash', args: ['scripts/validate-project.sh'] },
    { command: 'bash', args: ['scripts/validate-documentation.sh'] },
    { command: 'bash', args: ['scripts/validate-rnd-policy.sh'] },
    {
      command: 'python3',
      args: [
        'scripts/traceability/traceability.py',
        'validate',
        '--stories-dir',
        options.storiesDir,
        '--tests-root',
        options.testsRoot,
        '--skip-commits'
      ]
    }
  ];

  if (options.fullVerify) {
    commands.push({ command: 'bash', args: ['scripts/scaffold-and-verify.sh'] });
  }

  return commands;
}

export function formatCommandLine(command: ValidationCommand): string {
  return [command.command, ...command.args].join(' ');
}

export class ValidationRunner {
  private readonly repoRoot: string;

  constructor(repoRoot: string) {
    this.repoRoot = repoRoot;
  }

  async runAll(options: ValidationRunOptions): Promise<CommandResult[]> {
    const commands = buildValidationCommands(options);
    const results: CommandResult[] = [];

    logger.info('Running local validations', { count: commands.length, fullVerify: options.fullVerify });

    for (const command of commands) {
      const result = await this.runCommand(command);
      if (!result.success) {
        logger.warn('Validation command failed, continuing', {
          command: result.commandLine,
          exitCode: result.exitCode,
          error: result.error
        });
      }
      results.push(result);
    }

    const failed = results.filter((result) => !result.success).length;
    logger.info('Local validations finished', { total: results.length, failed });

    return results;
  }

  /**
   * Runs one command with inherited stdio; never rejects
   */
  runCommand(command: ValidationCommand): Promise<CommandResult> {
    const commandLine = formatCommandLine(command);
    const startTime = Date.now();

    logger.debug('Executing command', { command: sanitizeString(commandLine) });

    return new Promise((resolve) => {
      const child = spawn(command.command, [...command.args], {
        cwd: this.repoRoot,
        stdio: 'inherit'
      });

      child.on('error', (error) => {
        resolve({
          commandLine,
          exitCode: null,
          success: false,
          duration: Date.now() - startTime,
          error: error.message
        });
      });

      child.on('close', (code) => {
        resolve({
          commandLine,
          exitCode: code,
          success: code === 0,
          duration: Date.now() - startTime,
          ...(code !== 0 && { error: `exited with code ${code}` })
        });
      });
    });
  }
}
