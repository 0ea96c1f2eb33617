/**
 * Cross-reference rewriting for variant descriptors.
 */
import { xmlEscape } from '../render/template.js';

// A whole reference item on its own lines, long or self-closing form.
const PROJECT_REFERENCE =
  /^[ \t]*<ProjectReference\s+Include="([^"]*)"[^>]*?(?:\/>|>[\s\S]*?<\/ProjectReference>)[ \t]*(?:\r?\n)?/gm;

function normalizeInclude(include: string): string {
  return include.replace(/\\/g, '/');
}

/**
 * Keep references to surviving projects, re-pointed at their variant
 * copies, and drop every other reference.
 *
 * @param retargets - base descriptor path → variant descriptor path
 */
export function rewriteProjectReferences(content: string, retargets: ReadonlyMap<string, string>): string {
  const escaped = new Map<string, string>();
  for (const [from, to] of retargets) {
    escaped.set(xmlEscape(from), xmlEscape(to));
  }

  return content.replace(PROJECT_REFERENCE, (block: string, include: string) => {
    const target = escaped.get(normalizeInclude(include));
    if (target === undefined) return '';
    return block.replace(`Include="${include}"`, `Include="${target}"`);
  });
}
