/**
 * Token-level rewriting of `<DefineConstants>` for a variant.
 */
import { deduplicatePreservingOrder } from '../../utils/paths.js';
import type { VariantSpec } from './types.js';

const EDITOR_DEFINE = 'UNITY_EDITOR';
const DEBUG_DEFINES = new Set(['DEBUG', 'TRACE']);
const IOS_ALIAS = 'UNITY_IPHONE';

const DEFINE_CONSTANTS = /<DefineConstants>([^<]*)<\/DefineConstants>/g;

export function isEditorDefine(token: string): boolean {
  return token === EDITOR_DEFINE || token.startsWith(`${EDITOR_DEFINE}_`);
}

/**
 * Whether a variant keeps DEBUG and TRACE.
 */
export function keepsDebugDefines(spec: VariantSpec): boolean {
  return spec.configuration !== 'prod' || spec.debug;
}

export function stripEditorDefines(tokens: readonly string[]): string[] {
  return tokens.filter((token) => !isEditorDefine(token));
}

export function stripDebugDefines(tokens: readonly string[]): string[] {
  return tokens.filter((token) => !DEBUG_DEFINES.has(token));
}

/**
 * Replace the other platform's define with the target's.
 */
export function swapPlatformDefines(tokens: readonly string[], platform: VariantSpec['platform']): string[] {
  if (platform === 'ios') {
    return tokens.map((token) => (token === 'UNITY_ANDROID' ? 'UNITY_IOS' : token));
  }
  return tokens
    .filter((token) => token !== IOS_ALIAS)
    .map((token) => (token === 'UNITY_IOS' ? 'UNITY_ANDROID' : token));
}

export function rewriteDefineTokens(tokens: readonly string[], spec: VariantSpec): string[] {
  let result = [...tokens];
  if (spec.configuration !== 'editor') result = stripEditorDefines(result);
  if (!keepsDebugDefines(spec)) result = stripDebugDefines(result);
  return deduplicatePreservingOrder(swapPlatformDefines(result, spec.platform));
}

/**
 * Rewrite every `<DefineConstants>` element of a descriptor.
 * A trailing separator in the original list is kept.
 */
export function rewriteDefineConstants(content: string, spec: VariantSpec): string {
  return content.replace(DEFINE_CONSTANTS, (_match, list: string) => {
    const tokens = list
      .split(';')
      .map((token) => token.trim())
      .filter((token) => token.length > 0);
    const rewritten = rewriteDefineTokens(tokens, spec).join(';');
    const trailing = list.trimEnd().endsWith(';') && rewritten.length > 0 ? ';' : '';
    return `<DefineConstants>${rewritten}${trailing}</DefineConstants>`;
  });
}
