/**
 * Bridge client configuration: where the add-in listens and how long one call
 * may take.
 * Env: CADBRIDGE_HOST, CADBRIDGE_PORT, CADBRIDGE_TIMEOUT_MS.
 */

import { z } from "zod";
import {
  type EndpointConfig,
  type Logger,
  DEFAULT_HOST,
  DEFAULT_PORT,
  loadEndpointConfig,
  readEnvValue,
} from "@cadbridge/core";

const LOG_PREFIX = "cadbridge-client:config";

export const DEFAULT_TIMEOUT_MS: number = 10_000;

export interface BridgeClientConfig extends EndpointConfig {
  /** Per-call timeout covering connect, request and response body */
  timeoutMs: number;
}

export const defaultClientConfig: BridgeClientConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  timeoutMs: DEFAULT_TIMEOUT_MS,
};

const TimeoutSchema = z.coerce.number().int().positive();

export function loadClientConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): BridgeClientConfig {
  const env = params.env ?? process.env;
  const endpoint = loadEndpointConfig({ env, log: params.log, logPrefix: LOG_PREFIX });
  const timeoutMs = readEnvValue({
    env,
    name: "CADBRIDGE_TIMEOUT_MS",
    schema: TimeoutSchema,
    fallback: DEFAULT_TIMEOUT_MS,
    log: params.log,
    logPrefix: LOG_PREFIX,
  });
  return { ...endpoint, timeoutMs };
}
