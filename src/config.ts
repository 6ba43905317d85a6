import { z } from "zod";
import { ConfigError } from "./errors.ts";
import {
  DEFAULT_BASE_FONT_SIZE,
  DEFAULT_CALIBRATION_FACTOR,
  DEFAULT_MAX_FONT_SIZE,
} from "./layout-types.ts";

export const configSchema = z.object({
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
  fontSize: z.object({
    calibrationFactor: z.number().positive().default(DEFAULT_CALIBRATION_FACTOR),
    baseSize: z.number().positive().default(DEFAULT_BASE_FONT_SIZE),
    maxSize: z.number().positive().default(DEFAULT_MAX_FONT_SIZE),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): Config {
  const rawConfig = {
    logLevel: env.LOG_LEVEL || undefined,
    fontSize: {
      calibrationFactor: parseOptionalNumber(env.LAYOUT_CALIBRATION_FACTOR),
      baseSize: parseOptionalNumber(env.LAYOUT_BASE_FONT_SIZE),
      maxSize: parseOptionalNumber(env.LAYOUT_MAX_FONT_SIZE),
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${fields.join("; ")})`, parsed.error.issues);
  }
  return parsed.data;
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim().length === 0) return undefined;
  return Number.parseFloat(value);
}

export const config = loadConfig();
