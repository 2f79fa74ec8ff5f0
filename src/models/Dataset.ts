/**
 * Proxy Sheets – Source Dataset Records
 *
 * Only the fields the compiler reads are validated. Everything else in a dataset record
 * (flavor text, illustrator, quantities) passes through untouched and is ignored.
 */

import { z } from 'zod';

export const datasetPrintingSchema = z
  .object({
    id: z.string().regex(/^\d+$/, 'printing `id` must be a numeric string'),
    card_id: z.string().min(1),
    faces: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type DatasetPrinting = z.infer<typeof datasetPrintingSchema>;

export const datasetCardSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().min(1),
    stripped_title: z.string().min(1).optional(),
    faces: z
      .array(
        z
          .object({
            title: z.string().min(1),
            stripped_title: z.string().min(1).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export type DatasetCard = z.infer<typeof datasetCardSchema>;
