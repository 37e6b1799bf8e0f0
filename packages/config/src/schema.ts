import { z } from "zod";

/** Interop packages the config can declare */
export const INTEROP_LIBRARIES = ["gl-matrix", "three"] as const;

export type InteropLibrary = (typeof INTEROP_LIBRARIES)[number];

export const InteropConfig = z
  .object({
    "gl-matrix": z.boolean().optional(),
    three: z.boolean().optional(),
  })
  .strict();

export const UnitvecConfig = z
  .object({
    /** Default absolute tolerance for approximate comparisons */
    tolerance: z.number().finite().positive().optional(),
    /** Interop libraries the project uses */
    interop: InteropConfig.optional(),
  })
  .strict();

export type UnitvecConfig = z.infer<typeof UnitvecConfig>;
