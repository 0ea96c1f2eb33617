import { z } from 'zod';

export const ProjectKindSchema = z.enum(['declared', 'legacy']);
export const ModuleCategorySchema = z.enum(['runtime', 'editor', 'test']);

export const RegistryProjectSchema = z.object({
  name: z.string().min(1),
  outputPath: z.string().min(1),
  templatePath: z.string().min(1),
  /** Derived from the name when omitted */
  guid: z.string().min(1).optional(),
  kind: ProjectKindSchema,
  category: ModuleCategorySchema.default('runtime'),
  includePlatforms: z.array(z.string()).default([]),
  excludePlatforms: z.array(z.string()).default([]),
});

export const RegistryFileSchema = z.object({
  solutionPath: z.string().min(1),
  solutionTemplatePath: z.string().min(1),
  /** Falls back to the configured project type */
  projectTypeGuid: z.string().min(1).optional(),
  projects: z.array(RegistryProjectSchema),
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;
export type RegistryProject = z.infer<typeof RegistryProjectSchema>;
