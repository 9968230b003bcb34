import path from 'path';

export interface AppConfig {
  port: number;
  fleetPath: string | null; // null -> bundled data/fleet.json
  logPath: string;
}

const DEFAULT_PORT = 3000;

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

// Runtime settings, taken from the environment with local defaults
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    fleetPath: env.FLEET_PATH ? path.resolve(env.FLEET_PATH) : null,
    logPath: path.resolve(env.RENTAL_LOG_PATH || 'rental_log.txt'),
  };
}
