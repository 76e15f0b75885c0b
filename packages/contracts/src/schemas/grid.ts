import { z } from "zod";

const Uint8ArraySchema = z.instanceof(Uint8Array);

/**
 * Largest accepted side. Flat per-cell buffers are indexed with Int32.
 */
export const MAX_GRID_SIDE = 0x7fff;

export const PointSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const DimensionsSchema = z.object({
  width: z
    .number()
    .int()
    .positive({ error: "Width must be > 0" })
    .max(MAX_GRID_SIDE),
  height: z
    .number()
    .int()
    .positive({ error: "Height must be > 0" })
    .max(MAX_GRID_SIDE),
});

function layerMatches(
  layer: Uint8Array | string,
  encoding: "raw" | "base64url" | undefined,
): boolean {
  if (encoding === undefined) return true;
  return encoding === "raw" ? typeof layer !== "string" : typeof layer === "string";
}

/**
 * Serialized grid. Each layer is a bit-packed 0/1 stream (LSB first, row
 * major), either raw or base64url for transport.
 */
export const GridSnapshotSchema = DimensionsSchema.extend({
  /** Set bits block line of sight. */
  opaque: z.union([Uint8ArraySchema, z.base64url()]),
  /** Set bits block movement. */
  blocked: z.union([Uint8ArraySchema, z.base64url()]),
  encoding: z.enum(["raw", "base64url"]).optional(),
})
  .refine((s) => layerMatches(s.opaque, s.encoding), {
    message: "Layer does not match the declared encoding",
    path: ["opaque"],
  })
  .refine((s) => layerMatches(s.blocked, s.encoding), {
    message: "Layer does not match the declared encoding",
    path: ["blocked"],
  });

export type PointInput = z.infer<typeof PointSchema>;
export type DimensionsInput = z.infer<typeof DimensionsSchema>;
export type GridSnapshot = z.infer<typeof GridSnapshotSchema>;
