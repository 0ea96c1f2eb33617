import * as path from 'node:path';
import { readFileIfExists } from '../../utils/file-system.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';

export const VERSION_FILE = 'ProjectSettings/ProjectVersion.txt';
const VERSION_KEY = 'm_EditorVersion:';

/**
 * Extract the editor version from the contents of the version file.
 */
export function parseEditorVersion(content: string): string | null {
  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith(VERSION_KEY)) continue;
    const version = line.slice(VERSION_KEY.length).trim();
    return version || null;
  }
  return null;
}

/**
 * Editor version of a project, or null when the version file is absent or
 * has no version line.
 */
export async function readEditorVersion(projectRoot: string): Promise<string | null> {
  const content = await readFileIfExists(path.join(projectRoot, VERSION_FILE));
  return content === null ? null : parseEditorVersion(content);
}

/**
 * Editor version of a project; fails when it cannot be determined.
 */
export async function loadEditorVersion(projectRoot: string): Promise<string> {
  const version = await readEditorVersion(projectRoot);
  if (version === null) {
    throw new TemplateError(
      ErrorCodes.INVALID_EDITOR_VERSION,
      `Cannot read the editor version from ${VERSION_FILE}`,
      { path: path.join(projectRoot, VERSION_FILE) }
    );
  }
  return version;
}
