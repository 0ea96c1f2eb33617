import { Command } from 'commander';
import { extractTemplates } from '../../core/templates/extractor.js';
import { addCommonOptions, exitWithError, loadCommandContext, type CommonOptions } from './shared.js';

/**
 * Create the extract-templates command.
 */
export function createExtractTemplatesCommand(): Command {
  return addCommonOptions(
    new Command('extract-templates').description('Create templates from the descriptors listed in the existing solution')
  ).action(async (options: CommonOptions) => {
    try {
      const context = await loadCommandContext(options);
      const written = await extractTemplates({ projectRoot: context.projectRoot, config: context.config });
      console.log(context.formatter.formatWrittenFiles('Templates', written));
    } catch (error) {
      exitWithError(error);
    }
  });
}
