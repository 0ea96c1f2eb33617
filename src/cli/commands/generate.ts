import { Command } from 'commander';
import { generate } from '../../core/generator.js';
import { addCommonOptions, exitWithError, loadCommandContext, reportWarnings, type CommonOptions } from './shared.js';

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return addCommonOptions(
    new Command('generate').description('Regenerate project descriptors and the solution from templates')
  ).action(async (options: CommonOptions) => {
    try {
      const context = await loadCommandContext(options);
      const result = await generate({
        projectRoot: context.projectRoot,
        config: context.config,
        verbose: options.verbose ?? false,
        requireRegistry: context.registryRequested,
      });

      reportWarnings(result.warnings);
      console.log(context.formatter.formatGenerateResult(result));
    } catch (error) {
      exitWithError(error);
    }
  });
}
