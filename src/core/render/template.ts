/**
 * Placeholder substitution for descriptor templates.
 */

export const PLACEHOLDERS = {
  sourceFolders: '{{SOURCE_FOLDERS}}',
  projectReferences: '{{PROJECT_REFERENCES}}',
  projectRoot: '{{PROJECT_ROOT}}',
  editorVersion: '{{UNITY_VERSION}}',
  projectEntries: '{{PROJECT_ENTRIES}}',
  projectConfigs: '{{PROJECT_CONFIGS}}',
} as const;

export type Placeholder = (typeof PLACEHOLDERS)[keyof typeof PLACEHOLDERS];

/**
 * Replace every occurrence of each placeholder in one pass, so inserted
 * values are never scanned again. Placeholders without a value are left as
 * they are.
 */
export function renderTemplate(template: string, values: Partial<Record<Placeholder, string>>): string {
  const replacements = new Map<string, string>();
  for (const [placeholder, value] of Object.entries(values)) {
    if (value !== undefined) replacements.set(placeholder, value);
  }
  if (replacements.size === 0) return template;

  const pattern = new RegExp([...replacements.keys()].map(escapeRegExp).join('|'), 'g');
  return template.replace(pattern, (match) => replacements.get(match) ?? match);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether a template refers to a placeholder.
 */
export function usesPlaceholder(template: string, placeholder: Placeholder): boolean {
  return template.includes(placeholder);
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function xmlEscape(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}
