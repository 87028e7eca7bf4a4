import z from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://api.openweathermap.org/data/2.5";
export const DEFAULT_TIMEOUT_MS = 10_000;

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
    OPENWEATHER_API_KEY: z.string().trim().optional(),
    OPENWEATHER_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    WEATHER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface WeatherConfig {
    /** Undefined when the environment has none; reported on the first tool call. */
    readonly apiKey: string | undefined;
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): WeatherConfig {
    // empty values in .env mean "unset"
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
    );

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = issue?.path.join(".") ?? "environment";
        throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? "invalid value"}`);
    }

    return Object.freeze({
        apiKey: parsed.data.OPENWEATHER_API_KEY,
        baseUrl: parsed.data.OPENWEATHER_BASE_URL.replace(/\/+$/, ""),
        timeoutMs: parsed.data.WEATHER_HTTP_TIMEOUT_MS,
        logLevel: parsed.data.LOG_LEVEL,
    });
}
