/**
 * Options and plumbing shared by every command.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { GeneratorConfig } from '../../core/config/schema.js';
import { createFormatter, type IFormatter } from '../formatters/index.js';
import { logger } from '../../utils/logger.js';

export interface CommonOptions {
  root?: string;
  templateRoot?: string;
  registry?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export interface CommandContext {
  projectRoot: string;
  config: GeneratorConfig;
  /** A registry path was given on the command line, so it must exist */
  registryRequested: boolean;
  formatter: IFormatter;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <path>', 'Project root (default: current directory)')
    .option('--template-root <path>', 'Generator state directory, relative to the root')
    .option('--registry <path>', 'Project registry file, relative to the root')
    .option('-c, --config <path>', 'Config file, relative to the root')
    .option('-v, --verbose', 'Debug logging and per-project details')
    .option('-q, --quiet', 'Only print results and errors')
    .option('--json', 'Output results as JSON');
}

/**
 * Resolve the project root, logging level and configuration of a command.
 */
export async function loadCommandContext(options: CommonOptions): Promise<CommandContext> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }

  const projectRoot = path.resolve(options.root ?? process.cwd());
  const config = await loadConfig(projectRoot, options.config, {
    templateRoot: options.templateRoot,
    registry: options.registry,
  });

  return {
    projectRoot,
    config,
    registryRequested: options.registry !== undefined,
    formatter: createFormatter({
      format: options.json ? 'json' : 'human',
      colors: process.stdout.isTTY === true,
      verbose: options.verbose ?? false,
    }),
  };
}

export function reportWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    logger.warn(warning);
  }
}

/**
 * Print a fatal error as one line and exit non-zero.
 */
export function exitWithError(error: unknown): never {
  logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
  process.exit(1);
}
