// config/server.ts

const parseList = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  jsonBodyLimit: string;
  maxMappingSessions: number;
}

export const loadServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => ({
  port: parsePositiveInt(env.PORT, 3000),
  corsOrigins: parseList(env.CORS_ORIGINS, ["http://localhost:5000"]),
  jsonBodyLimit: env.JSON_BODY_LIMIT || "5mb",
  // Sessions beyond this count evict the oldest one
  maxMappingSessions: parsePositiveInt(env.MAX_MAPPING_SESSIONS, 100),
});
