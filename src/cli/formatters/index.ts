import type { FormatOptions, IFormatter } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';

export type { FormatOptions, IFormatter, OutputFormat } from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

/**
 * Formatter for the requested output format.
 */
export function createFormatter(options: Partial<FormatOptions> = {}): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
