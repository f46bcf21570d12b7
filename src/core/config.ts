// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseDuration } from "../utils/duration.js";

const DurationSchema = z.string().refine(
    (value) => {
        try {
            parseDuration(value);
            return true;
        } catch {
            return false;
        }
    },
    { message: "Expected a duration such as 30s, 1m or 1h" }
);

export const ProviderConfigSchema = z.object({
    url: z.string().url(),
    authorizeTimeoutMs: z.number().int().min(100).max(60000),
});

export const StoreConfigSchema = z.object({
    maxPointsPerInstrument: z.number().int().min(10).max(100000),
});

export const FeedConfigSchema = z.object({
    enabled: z.boolean(),
    instruments: z.array(z.string().min(1)),
    trustSubscriptionEcho: z.boolean(),
});

export const SignalDefaultsSchema = z.object({
    defaultTimeframe: DurationSchema,
    defaultExpiration: DurationSchema,
});

export const LoggingConfigSchema = z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    pretty: z.boolean(),
});

export const ConfigSchema = z.object({
    provider: ProviderConfigSchema,
    store: StoreConfigSchema,
    feed: FeedConfigSchema,
    signal: SignalDefaultsSchema,
    /** User-facing instrument names mapped to provider symbols. */
    symbols: z.record(z.string().min(1), z.string().min(1)),
    logging: LoggingConfigSchema,
});

const EnvSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PROVIDER_URL: z.string().url().optional(),
    PROVIDER_TOKEN: z.string().min(1).optional(),
    LOG_LEVEL: LoggingConfigSchema.shape.level.optional(),
});

export type FileConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig extends FileConfig {
    nodeEnv: "development" | "production" | "test";
    provider: FileConfig["provider"] & { token?: string };
}

export function formatIssues(error: z.ZodError): string[] {
    return error.errors.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
}

/**
 * Validates a parsed config.json plus environment overrides.
 * PROVIDER_URL, PROVIDER_TOKEN and LOG_LEVEL take precedence over the file.
 */
export function parseConfig(
    rawConfig: unknown,
    env: NodeJS.ProcessEnv = process.env
): AppConfig {
    const file = ConfigSchema.safeParse(rawConfig);
    if (!file.success) {
        throw new ConfigError("config.json validation failed", formatIssues(file.error));
    }
    const vars = EnvSchema.safeParse(env);
    if (!vars.success) {
        throw new ConfigError("environment validation failed", formatIssues(vars.error));
    }

    const cfg = file.data;
    return {
        ...cfg,
        nodeEnv: vars.data.NODE_ENV,
        provider: {
            ...cfg.provider,
            url: vars.data.PROVIDER_URL ?? cfg.provider.url,
            ...(vars.data.PROVIDER_TOKEN !== undefined
                ? { token: vars.data.PROVIDER_TOKEN }
                : {}),
        },
        logging: {
            ...cfg.logging,
            level: vars.data.LOG_LEVEL ?? cfg.logging.level,
        },
    };
}

/**
 * Reads and validates config.json (by default from the working directory).
 */
export function loadConfig(
    path: string = resolve(process.cwd(), "config.json"),
    env: NodeJS.ProcessEnv = process.env
): AppConfig {
    let rawConfig: unknown;
    try {
        rawConfig = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigError(
            `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return parseConfig(rawConfig, env);
}
