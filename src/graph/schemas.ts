import { z } from "zod";

/** Validates a single task entry in a tasks file. */
export const taskSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  completed: z.boolean().default(false),
  depends: z.array(z.string().min(1)).default([]),
  parallelGroup: z.number().int().nonnegative().optional(),
});

/** Validates the full tasks file structure. */
export const tasksDocumentSchema = z.object({
  tasks: z.array(taskSchema),
});
