/**
 * Server configuration from environment (.env supported)
 */

import { config as loadEnv } from "dotenv";
import { z } from "zod";

const ConfigSchema = z.object({
  transport: z.enum(["stdio", "httpStream"]).default("stdio"),
  port: z.coerce.number().int().min(1).max(65535).default(8080),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build the server config from an environment map.
 * Unset variables fall back to defaults; invalid ones throw ConfigError.
 */
export function parseConfig(env: Record<string, string | undefined>): ServerConfig {
  const result = ConfigSchema.safeParse({
    transport: env.TANGENT_MCP_TRANSPORT || undefined,
    port: env.TANGENT_MCP_PORT || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return result.data;
}

/** Load .env into process.env, then parse it */
export function loadConfig(): ServerConfig {
  loadEnv({ quiet: true });
  return parseConfig(process.env);
}
