import { z } from "zod";
import { PROFILE_TYPES } from "./profile.js";

/** Runtime settings of the composer, read from config.yaml. */
export const ComposerConfigSchema = z.object({
  default_profile: z.enum(PROFILE_TYPES),
  /** Directory with baseline.yaml and <profile>.yaml; null uses the built-in profiles. */
  profiles_dir: z.string().nullable(),
  catalog: z.object({
    additional_paths: z.array(z.string()),
  }),
  validation: z.object({
    semantic_checks: z.boolean(),
  }),
  output: z.object({
    include_tree: z.boolean(),
  }),
});

export type ComposerConfig = z.infer<typeof ComposerConfigSchema>;
