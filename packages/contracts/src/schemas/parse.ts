import { z } from "zod";
import { SpatialError, type SpatialErrorCode } from "../types/error";
import { Result } from "../types/result";
import { type BenchConfig, BenchConfigSchema, type FovQuery, FovQuerySchema, type PathQuery, PathQuerySchema } from "./query";

/**
 * Validate `input` against `schema`, turning zod issues into a SpatialError.
 */
export function parseWith<S extends z.ZodType>(
  schema: S,
  input: unknown,
  code: SpatialErrorCode = "CONFIG_INVALID",
): Result<z.output<S>, SpatialError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return Result.ok(parsed.data);
  }
  return Result.err(
    SpatialError.create(code, z.prettifyError(parsed.error), {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    }),
  );
}

export function parseFovQuery(input: unknown): Result<FovQuery, SpatialError> {
  return parseWith(FovQuerySchema, input);
}

export function parsePathQuery(input: unknown): Result<PathQuery, SpatialError> {
  return parseWith(PathQuerySchema, input);
}

export function parseBenchConfig(
  input: unknown,
): Result<BenchConfig, SpatialError> {
  return parseWith(BenchConfigSchema, input);
}
