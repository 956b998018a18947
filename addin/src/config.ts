/**
 * Add-in configuration: the loopback address the bridge server binds to.
 * Env: CADBRIDGE_HOST, CADBRIDGE_PORT.
 */

import { type EndpointConfig, type Logger, DEFAULT_HOST, DEFAULT_PORT, loadEndpointConfig } from "@cadbridge/core";

const LOG_PREFIX = "cadbridge-addin:config";

export type AddinConfig = EndpointConfig;

export const defaultAddinConfig: AddinConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
};

export function loadConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): AddinConfig {
  const config = loadEndpointConfig({ env: params.env, log: params.log, logPrefix: LOG_PREFIX });
  params.log?.info?.({ host: config.host, port: config.port }, `${LOG_PREFIX}:loadConfig - Loaded config`);
  return config;
}
