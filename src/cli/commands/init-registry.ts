import { Command } from 'commander';
import { initRegistry } from '../../core/templates/registry-init.js';
import { addCommonOptions, exitWithError, loadCommandContext, type CommonOptions } from './shared.js';

/**
 * Create the init-registry command.
 */
export function createInitRegistryCommand(): Command {
  return addCommonOptions(
    new Command('init-registry').description('Write a project registry listing the projects of the existing solution')
  ).action(async (options: CommonOptions) => {
    try {
      const context = await loadCommandContext(options);
      const result = await initRegistry({ projectRoot: context.projectRoot, config: context.config });
      console.log(
        context.formatter.formatWrittenFiles(
          `Registry (${result.projectCount} project(s))`,
          result.written ? [result.registryPath] : []
        )
      );
    } catch (error) {
      exitWithError(error);
    }
  });
}
