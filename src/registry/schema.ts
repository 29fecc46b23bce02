import { z } from "zod";

export const PLUGIN_KINDS = ["plugin", "library"] as const;

export type PluginKind = (typeof PLUGIN_KINDS)[number];

const entrySchema = z.union([
  z.string().min(1).transform((project) => ({ project, kind: "plugin" as const })),
  z.object({
    project: z.string().min(1),
    kind: z.enum(PLUGIN_KINDS).default("plugin"),
  }),
]);

export const registryFileSchema = z.object({
  plugins: z.record(z.string().min(1), entrySchema).default({}),
});

export type RegistryFile = z.infer<typeof registryFileSchema>;
