/**
 * Zod runtime schemas for the wire envelopes.
 *
 * These mirror the TypeScript types in envelope.ts. The client validates every
 * response body against ResponseEnvelopeSchema; anything else is a parse error.
 */

import { z } from "zod";

export const ErrorBodySchema = z.object({
  type: z.string(),
  message: z.string(),
});

export const SuccessEnvelopeSchema = z.object({
  success: z.literal(true),
  result: z.unknown(),
});

export const ErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z
    .object({
      type: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

export const ResponseEnvelopeSchema = z.discriminatedUnion("success", [
  SuccessEnvelopeSchema,
  ErrorEnvelopeSchema,
]);

export type ResponseEnvelopeWire = z.infer<typeof ResponseEnvelopeSchema>;

export const ActionParamsSchema = z.record(z.unknown());
