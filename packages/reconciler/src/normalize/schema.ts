import { z } from "zod";

/** Coordinate given as a number or a numeric string; must be finite */
const coordinate = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

/** Free text given as a string or a number (numeric names survive CSV round trips) */
const text = z
  .union([z.string(), z.number().transform(String)])
  .transform((value) => value.trim());

/**
 * Shape of a catalog row once its code has been normalized.
 * Street may be missing; a stop without a name is not usable.
 */
export const stopRowSchema = z.object({
  name: text.pipe(z.string().min(1)),
  street: z
    .union([text, z.null()])
    .optional()
    .transform((value) => value ?? ""),
  lat: coordinate,
  lon: coordinate,
});

export type StopRowFields = z.infer<typeof stopRowSchema>;
