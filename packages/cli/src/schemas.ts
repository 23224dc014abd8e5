import { z } from "zod";

export const PlatformSchema = z.enum(["darwin", "linux", "win32"]);
export type Platform = z.infer<typeof PlatformSchema>;

export const NonEmptyString = z.string().trim().min(1);

export const StoredPresetsSchema = z
  .object({
    tenantName: z.string().optional(),
    orgKey: z.string().optional(),
    certName: z.string().optional(),
    certDir: z.string().optional()
  });
export type StoredPresets = z.infer<typeof StoredPresetsSchema>;

export const RunConfigSchema = z.object({
  tenantName: NonEmptyString,
  orgKey: NonEmptyString,
  certName: NonEmptyString,
  certDir: NonEmptyString,
  recreateCert: z.boolean(),
  debug: z.boolean(),
  tenantBundle: z.boolean(),
  shellProfile: z.string().min(1).optional(),
  platform: PlatformSchema
});
export type RunConfig = Readonly<z.infer<typeof RunConfigSchema>>;

export const BUNDLE_PLACEHOLDER = "{bundle}";

export const PostCommandSchema = z.object({
  command: NonEmptyString,
  args: z.array(z.string())
});
export type PostCommand = z.infer<typeof PostCommandSchema>;

export const ToolSpecSchema = z.object({
  id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/),
  name: NonEmptyString,
  envVar: z
    .string()
    .regex(/^[A-Z_][A-Z0-9_]*$/)
    .optional(),
  checkCommand: z.string().regex(/^[a-zA-Z0-9._-]+$/),
  versionArgs: z.array(z.string()).min(1),
  postCommand: PostCommandSchema.optional()
});
export type ToolSpec = Readonly<z.infer<typeof ToolSpecSchema>>;

export const ToolRegistrySchema = z.array(ToolSpecSchema).min(1);
