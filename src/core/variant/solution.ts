/**
 * Derive a variant solution from the generated one.
 */
import { parseProjectLine } from '../templates/solution.js';

/**
 * Drop the projects that did not survive and re-point the others.
 *
 * @param retargets - base descriptor path → variant descriptor path
 * @param removedGuids - identifiers of dropped projects
 */
export function rewriteSolution(
  content: string,
  retargets: ReadonlyMap<string, string>,
  removedGuids: ReadonlySet<string>
): string {
  const lines = content.split('\n');
  const output: string[] = [];
  let skippingBlock = false;

  for (const line of lines) {
    if (skippingBlock) {
      if (line.trim() === 'EndProject') skippingBlock = false;
      continue;
    }

    const entry = parseProjectLine(line);
    if (entry) {
      if (removedGuids.has(entry.projectGuid)) {
        skippingBlock = true;
        continue;
      }
      const target = retargets.get(entry.descriptorPath);
      output.push(target === undefined ? line : line.replace(`"${entry.descriptorPath}"`, `"${target}"`));
      continue;
    }

    const trimmed = line.trim();
    if ([...removedGuids].some((guid) => trimmed.startsWith(`${guid}.`))) continue;
    output.push(line);
  }

  return output.join('\n');
}
