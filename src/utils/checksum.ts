/**
 * Name-derived identifiers for descriptor cross-references.
 */
import { createHash } from 'node:crypto';

const IDENTIFIER_NAMESPACE = 'csproj-forge:';

/**
 * Deterministic project identifier for a module name, formatted as an
 * upper-case braced GUID. Stable across runs and machines.
 */
export function deterministicGuid(name: string): string {
  const hex = createHash('md5').update(IDENTIFIER_NAMESPACE + name).digest('hex').toUpperCase();
  return `{${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}}`;
}
