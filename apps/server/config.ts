import { z } from "zod";
import type { ContainerSpec } from "@stowplan/engine";

// 40 ft dry container, metres and kilograms
const DEFAULT_CONTAINER: ContainerSpec = {
  name: "40ft Container",
  width: 12.03,
  height: 2.39,
  depth: 2.35,
  max_weight: 28000,
};

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  CORS_ORIGINS: z.string().default(""),
  MAX_UNITS_PER_REQUEST: z.coerce.number().int().positive().default(5000),
  DEFAULT_CONTAINER_NAME: z.string().min(1).default(DEFAULT_CONTAINER.name),
  DEFAULT_CONTAINER_WIDTH: z.coerce.number().positive().default(DEFAULT_CONTAINER.width),
  DEFAULT_CONTAINER_HEIGHT: z.coerce.number().positive().default(DEFAULT_CONTAINER.height),
  DEFAULT_CONTAINER_DEPTH: z.coerce.number().positive().default(DEFAULT_CONTAINER.depth),
  DEFAULT_CONTAINER_MAX_WEIGHT: z.coerce.number().positive().default(DEFAULT_CONTAINER.max_weight),
});

export interface ServerConfig {
  port: number;
  host: string;
  /** Empty list reflects the request origin. */
  corsOrigins: string[];
  maxUnitsPerRequest: number;
  defaultContainer: ContainerSpec;
}

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map(i => `${i.path.join(".")} ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    corsOrigins: vars.CORS_ORIGINS.split(",").map(o => o.trim()).filter(o => o !== ""),
    maxUnitsPerRequest: vars.MAX_UNITS_PER_REQUEST,
    defaultContainer: {
      name: vars.DEFAULT_CONTAINER_NAME,
      width: vars.DEFAULT_CONTAINER_WIDTH,
      height: vars.DEFAULT_CONTAINER_HEIGHT,
      depth: vars.DEFAULT_CONTAINER_DEPTH,
      max_weight: vars.DEFAULT_CONTAINER_MAX_WEIGHT,
    },
  };
}
