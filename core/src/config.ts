/**
 * Endpoint configuration shared by the add-in (bind address) and the client
 * (target address).
 * Env: CADBRIDGE_HOST, CADBRIDGE_PORT.
 */

import { z } from "zod";
import type { Logger } from "./logger.js";

export const DEFAULT_HOST: string = "localhost";
export const DEFAULT_PORT: number = 3600;

export interface EndpointConfig {
  host: string;
  port: number;
}

export const HostSchema = z.string().trim().min(1);
export const PortSchema = z.coerce.number().int().min(0).max(65535);

/**
 * Parse one env value with `schema`. Unset → fallback; invalid → warn and
 * fallback.
 */
export function readEnvValue<T>(params: {
  env: NodeJS.ProcessEnv;
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  fallback: T;
  log?: Logger;
  logPrefix: string;
}): T {
  const raw = params.env[params.name];
  if (raw === undefined || raw === "") return params.fallback;
  const parsed = params.schema.safeParse(raw);
  if (!parsed.success) {
    params.log?.warn?.(
      { name: params.name, value: raw, fallback: params.fallback },
      `${params.logPrefix}:loadConfig - Invalid value, using default`,
    );
    return params.fallback;
  }
  return parsed.data;
}

export function loadEndpointConfig(params: {
  env?: NodeJS.ProcessEnv;
  log?: Logger;
  logPrefix: string;
}): EndpointConfig {
  const env = params.env ?? process.env;
  return {
    host: readEnvValue({ env, name: "CADBRIDGE_HOST", schema: HostSchema, fallback: DEFAULT_HOST, log: params.log, logPrefix: params.logPrefix }),
    port: readEnvValue({ env, name: "CADBRIDGE_PORT", schema: PortSchema, fallback: DEFAULT_PORT, log: params.log, logPrefix: params.logPrefix }),
  };
}
