import { z } from "zod";
import { PointSchema } from "./grid";

export const FovQuerySchema = z.object({
  origin: PointSchema,
  radius: z.number().int({ error: "Radius must be an integer" }),
  includeWalls: z.boolean().default(true),
});

export const PathQuerySchema = z.object({
  from: PointSchema,
  to: PointSchema,
});

export const BenchConfigSchema = z.object({
  width: z.number().int().min(3).max(1024).default(45),
  height: z.number().int().min(3).max(1024).default(45),
  radius: z.number().int().min(0).default(24),
  walls: z.number().int().min(0).default(10),
  runs: z.number().int().positive().default(200),
  seed: z.number().int().nonnegative().default(42),
  json: z.boolean().default(false),
});

export type FovQuery = z.infer<typeof FovQuerySchema>;
export type FovQueryInput = z.input<typeof FovQuerySchema>;
export type PathQuery = z.infer<typeof PathQuerySchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;
