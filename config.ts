import * as dotenv from "dotenv";
import { DEFAULT_BASE_URL } from "./services/nilu-client";

// Picks up a local .env file during development; real environment wins
dotenv.config();

export interface ServiceConfig {
  apiBaseUrl: string;
  port: number;
  corsOrigins: string | string[];
}

function parseOrigins(value: string | undefined): string | string[] {
  const origins = (value ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : "*";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    apiBaseUrl: env.NILU_API_URL || DEFAULT_BASE_URL,
    port: Number(env.PORT) || 3001,
    corsOrigins: parseOrigins(env.CORS_ORIGINS),
  };
}
