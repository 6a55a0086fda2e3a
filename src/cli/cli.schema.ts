import { z } from "zod";
import { InvalidArgumentError } from "../shared/shared.errors";

export const padAssignmentSchema = z.object({
  group: z.string(),
  pad: z.number().int(),
  sample: z.number().int(),
});

export const patternEventSchema = z.object({
  pattern: z.string(),
  time: z.number().int(),
  pad: z.number().int(),
  velocity: z.number().int().optional(),
});

export const projectDescriptionSchema = z.object({
  deviceSku: z.string().min(1).optional(),
  projectSlot: z.number().int().optional(),
  template: z.string().min(1).optional(),
  sounds: z.string().min(1).optional(),
  assignments: z.array(padAssignmentSchema).default([]),
  events: z.array(patternEventSchema).default([]),
});

export type PadAssignmentDescription = z.infer<typeof padAssignmentSchema>;
export type PatternEventDescription = z.infer<typeof patternEventSchema>;
export type ProjectDescription = z.infer<typeof projectDescriptionSchema>;

export const parseProjectDescription = (payload: unknown): ProjectDescription => {
  const result = projectDescriptionSchema.safeParse(payload);
  if (result.success) {
    return result.data;
  }

  const details = result.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new InvalidArgumentError(`Invalid project description: ${details}`);
};
