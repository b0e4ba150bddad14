import { IANAZone } from "luxon";
import * as z from "zod";

export const logLevelSchema = z.enum(["quiet", "normal", "verbose"]);

const timezoneSchema = z
  .string()
  .trim()
  .refine(
    (name) => name === "" || IANAZone.isValidZone(name),
    "Unknown time zone",
  );

export const envSchema = z.object({
  UNIXTIME_TIMEZONE: timezoneSchema.optional(),
  UNIXTIME_LOG_LEVEL: logLevelSchema.default("normal"),
});

export const configSchema = envSchema.transform((env) => ({
  timezone: env.UNIXTIME_TIMEZONE || undefined,
  logLevel: env.UNIXTIME_LOG_LEVEL,
}));

export type Config = z.infer<typeof configSchema>;
