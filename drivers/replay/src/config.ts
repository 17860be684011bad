import { z } from "zod";

export const ReplayConnectionSchema = z
  .object({
    file: z.string().min(1).optional(),
    lines: z.array(z.string()).optional(),
    intervalMs: z.number().int().nonnegative().default(0),
    loop: z.boolean().default(false)
  })
  .refine((value) => value.file !== undefined || value.lines !== undefined, {
    message: "replay transport needs either file or lines"
  });

export type ReplayConnection = z.infer<typeof ReplayConnectionSchema>;
