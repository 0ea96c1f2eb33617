/**
 * Build variants: one platform and one build configuration.
 */

export type BuildPlatform = 'ios' | 'android';

/**
 * `editor` keeps every module and define; `dev` keeps runtime modules and
 * debug defines; `prod` keeps runtime modules only.
 */
export type BuildConfiguration = 'editor' | 'dev' | 'prod';

export const BUILD_PLATFORMS: readonly BuildPlatform[] = ['ios', 'android'];
export const BUILD_CONFIGURATIONS: readonly BuildConfiguration[] = ['editor', 'dev', 'prod'];

export interface PlatformTraits {
  /** Name used in declaration platform lists */
  platformName: string;
  define: string;
}

export const PLATFORM_TRAITS: Record<BuildPlatform, PlatformTraits> = {
  ios: { platformName: 'iOS', define: 'UNITY_IOS' },
  android: { platformName: 'Android', define: 'UNITY_ANDROID' },
};

export interface VariantSpec {
  platform: BuildPlatform;
  configuration: BuildConfiguration;
  /** Keep DEBUG and TRACE in a prod build */
  debug: boolean;
}

export interface VariantResult {
  /** e.g. `ios-prod` */
  variant: string;
  /** e.g. `.v.ios-prod` */
  suffix: string;
  /** Descriptor copies written by this run, sorted */
  generated: string[];
  /** Descriptor copies already fresh, sorted */
  skipped: string[];
  /** Variant solution path, relative to the project root */
  solutionPath: string;
  /** Properties file path, relative to the project root */
  propertiesPath: string;
}

export function isBuildPlatform(value: string): value is BuildPlatform {
  return BUILD_PLATFORMS.some((platform) => platform === value);
}

export function isBuildConfiguration(value: string): value is BuildConfiguration {
  return BUILD_CONFIGURATIONS.some((configuration) => configuration === value);
}

/**
 * Variant name. A prod build that keeps debug defines gets its own name so
 * its copies never pass for the plain prod ones.
 */
export function variantName(spec: VariantSpec): string {
  const base = `${spec.platform}-${spec.configuration}`;
  return spec.configuration === 'prod' && spec.debug ? `${base}-debug` : base;
}

export function variantSuffix(spec: VariantSpec): string {
  return `.v.${variantName(spec)}`;
}

/**
 * Insert the variant suffix before a descriptor's extension:
 * `Core.csproj` → `Core.v.ios-prod.csproj`.
 */
export function variantPath(outputPath: string, suffix: string): string {
  const dot = outputPath.lastIndexOf('.');
  const slash = outputPath.lastIndexOf('/');
  if (dot <= slash + 1) return `${outputPath}${suffix}`;
  return `${outputPath.slice(0, dot)}${suffix}${outputPath.slice(dot)}`;
}
