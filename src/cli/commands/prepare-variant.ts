import { Command } from 'commander';
import { prepareVariant } from '../../core/generator.js';
import {
  BUILD_CONFIGURATIONS,
  BUILD_PLATFORMS,
  isBuildConfiguration,
  isBuildPlatform,
} from '../../core/variant/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { addCommonOptions, exitWithError, loadCommandContext, type CommonOptions } from './shared.js';

interface PrepareVariantCommandOptions extends CommonOptions {
  debug?: boolean;
}

/**
 * Create the prepare-variant command.
 *
 * Prints the variant solution path on stdout so a build script can pass it
 * straight to the compiler.
 */
export function createPrepareVariantCommand(): Command {
  return addCommonOptions(
    new Command('prepare-variant')
      .description('Derive filtered descriptor copies for one platform and build configuration')
      .argument('<platform>', `Target platform (${BUILD_PLATFORMS.join(', ')})`)
      .argument('<configuration>', `Build configuration (${BUILD_CONFIGURATIONS.join(', ')})`)
      .option('--debug', 'Keep DEBUG and TRACE defines in a prod build')
  ).action(async (platform: string, configuration: string, options: PrepareVariantCommandOptions) => {
    try {
      if (!isBuildPlatform(platform)) {
        throw new ConfigError(ErrorCodes.INVALID_ARGUMENT, `Unknown platform '${platform}'`, { platform });
      }
      if (!isBuildConfiguration(configuration)) {
        throw new ConfigError(ErrorCodes.INVALID_ARGUMENT, `Unknown build configuration '${configuration}'`, {
          configuration,
        });
      }

      const context = await loadCommandContext(options);
      const result = await prepareVariant({
        projectRoot: context.projectRoot,
        config: context.config,
        requireRegistry: context.registryRequested,
        platform,
        configuration,
        debug: options.debug ?? false,
      });

      if (options.json) {
        console.log(context.formatter.formatVariantResult(result));
        return;
      }
      console.error(context.formatter.formatVariantResult(result));
      console.log(result.solutionPath);
    } catch (error) {
      exitWithError(error);
    }
  });
}
