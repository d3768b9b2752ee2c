export interface ServerConfig {
  port: number;
  /** Planner profile name (PLANNER_PROFILE) */
  profileName?: string;
  /** Network JSON path overriding the configured network (NETWORK_FILE) */
  networkFile?: string;
}

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env["PORT"] ?? "3000", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT "${env["PORT"]}"`);
  }
  return {
    port,
    profileName: env["PLANNER_PROFILE"] || undefined,
    networkFile: env["NETWORK_FILE"] || undefined,
  };
}
