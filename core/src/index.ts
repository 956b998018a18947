// Errors (taxonomy)
export * from "./errors.js";

// Envelopes & results
export * from "./envelope.js";

// Envelope Zod schemas (runtime validation)
export {
  ErrorBodySchema,
  SuccessEnvelopeSchema,
  ErrorEnvelopeSchema,
  ResponseEnvelopeSchema,
  ActionParamsSchema,
  type ResponseEnvelopeWire,
} from "./envelope-schema.js";

// Logging
export * from "./logger.js";

// Configuration
export * from "./config.js";
