import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createGenerateCommand } from './commands/generate.js';
import { createPrepareVariantCommand } from './commands/prepare-variant.js';
import { createExtractTemplatesCommand } from './commands/extract-templates.js';
import { createInitRegistryCommand } from './commands/init-registry.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageSchema = z.object({ version: z.string() });
const VERSION = PackageSchema.parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('csproj-forge')
    .description('Generate project descriptors and a solution for a module-based source tree')
    .version(VERSION);
  [createGenerateCommand, createPrepareVariantCommand, createExtractTemplatesCommand, createInitRegistryCommand].forEach(
    (cmd) => program.addCommand(cmd())
  );
  return program;
}
