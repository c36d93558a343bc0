import { isAbsolute } from "node:path";
import { z } from "zod";

export const uiConfigSchema = z.object({
  refreshMs: z.number().int().positive().default(200),
});

export const agentConfigSchema = z.object({
  engine: z
    .string()
    .default("claude")
    .refine((engine) => engine === "claude", (engine) => ({
      message: `Unsupported engine '${engine}', only 'claude' is supported`,
    })),
  maxIterations: z.number().int().positive().default(3),
  autoPr: z.boolean().default(true),
  draftPr: z.boolean().default(false),
});

export const projectOverridesSchema = z.object({
  maxIterations: z.number().int().positive().optional(),
  autoPr: z.boolean().optional(),
  draftPr: z.boolean().optional(),
});

export const projectConfigSchema = z.object({
  name: z.string().min(1),
  repoPath: z.string().refine(isAbsolute, (repoPath) => ({
    message: `repoPath must be absolute: ${repoPath}`,
  })),
  /** Relative paths resolve against repoPath. */
  tasksFile: z.string().min(1),
  baseBranch: z.string().min(1),
  maxParallel: z.number().int().positive(),
  overrides: projectOverridesSchema.optional(),
});

export const taskgraphConfigSchema = z.object({
  ui: uiConfigSchema.default({}),
  agent: agentConfigSchema.default({}),
  projects: z
    .array(projectConfigSchema)
    .min(1, "At least one project must be configured"),
});

export type TaskgraphConfig = z.output<typeof taskgraphConfigSchema>;
export type AgentConfig = z.output<typeof agentConfigSchema>;
export type ProjectConfig = z.output<typeof projectConfigSchema>;
export type TaskgraphConfigInput = z.input<typeof taskgraphConfigSchema>;
