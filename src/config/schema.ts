/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

/** Dispatch options applied when the caller does not override them. */
export const dispatchDefaultsSchema = z.object({
  role: z.string().min(1).default("user"),
  saveContext: z.boolean().default(false),
  appendPromptBeforeCall: z.boolean().default(false),
});

export const instanceSchema = z.object({
  id: z.string().min(1),
  /** Backend type name as registered in the catalog (e.g. "openrouter") */
  type: z.string().min(1),
  /**
   * Backend-specific settings, passed through untouched.
   * `apiKey: secrets` / `apiKey: env` are resolved by the loader.
   */
  config: z.record(z.string(), z.unknown()).default({}),
});

export const configSchema = z.object({
  defaults: dispatchDefaultsSchema.default({}),
  instances: z
    .array(instanceSchema)
    .default([])
    .superRefine((instances, ctx) => {
      const seen = new Set<string>();
      instances.forEach((instance, index) => {
        if (seen.has(instance.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate instance id '${instance.id}'`,
            path: [index, "id"],
          });
        }
        seen.add(instance.id);
      });
    }),
});

/** secrets.yaml: per instance id or per backend type */
export const secretsSchema = z.record(
  z.string(),
  z.object({ apiKey: z.string().optional() }).passthrough(),
);

export type Config = z.infer<typeof configSchema>;
export type InstanceConfig = z.infer<typeof instanceSchema>;
export type DispatchDefaults = z.infer<typeof dispatchDefaultsSchema>;
export type Secrets = z.infer<typeof secretsSchema>;
