// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

import { ConfigError, Err, Ok, type Result } from "@switchyard/core";
import type { DispatchMode } from "./dispatcher";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./logger";

/** Configuration for the Node transport and the app around it. */
export interface ServerConfig {
	/** Port to listen on (default 3000, 0 picks a free port). */
	port: number;
	/** Interface to bind (default "0.0.0.0"). */
	host: string;
	/** Largest request body accepted, in bytes (default 1 MiB). */
	maxBodyBytes: number;
	/** How long `stop()` waits for in-flight requests (default 10s). */
	drainTimeoutMs: number;
	/** Minimum log level (default "info"). */
	logLevel: LogLevel;
	/** Dispatch mode (default "production"). */
	mode: DispatchMode;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;
export const DEFAULT_DRAIN_TIMEOUT_MS = 10_000;

/** Environment variables read by {@link configFromEnv}. */
export const ENV_KEYS = {
	port: "SWITCHYARD_PORT",
	host: "SWITCHYARD_HOST",
	maxBodyBytes: "SWITCHYARD_MAX_BODY_BYTES",
	drainTimeoutMs: "SWITCHYARD_DRAIN_TIMEOUT_MS",
	logLevel: "SWITCHYARD_LOG_LEVEL",
	mode: "SWITCHYARD_MODE",
} as const;

/** Fill in defaults for any omitted field. */
export function resolveConfig(partial: Partial<ServerConfig> = {}): ServerConfig {
	return {
		port: partial.port ?? DEFAULT_PORT,
		host: partial.host ?? DEFAULT_HOST,
		maxBodyBytes: partial.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
		drainTimeoutMs: partial.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
		logLevel: partial.logLevel ?? "info",
		mode: partial.mode ?? "production",
	};
}

function parseInteger(
	env: Record<string, string | undefined>,
	key: string,
	min: number,
	max: number,
): Result<number | undefined, ConfigError> {
	const raw = env[key];
	if (raw === undefined || raw.trim() === "") return Ok(undefined);
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min || value > max) {
		return Err(new ConfigError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`));
	}
	return Ok(value);
}

function isDispatchMode(value: string): value is DispatchMode {
	return value === "development" || value === "production";
}

/**
 * Build a {@link ServerConfig} from environment variables.
 *
 * Unset or empty variables fall back to defaults; malformed values are
 * reported rather than ignored.
 */
export function configFromEnv(
	env: Record<string, string | undefined> = process.env,
): Result<ServerConfig, ConfigError> {
	const port = parseInteger(env, ENV_KEYS.port, 0, 65_535);
	if (!port.ok) return port;
	const maxBodyBytes = parseInteger(env, ENV_KEYS.maxBodyBytes, 0, Number.MAX_SAFE_INTEGER);
	if (!maxBodyBytes.ok) return maxBodyBytes;
	const drainTimeoutMs = parseInteger(env, ENV_KEYS.drainTimeoutMs, 0, Number.MAX_SAFE_INTEGER);
	if (!drainTimeoutMs.ok) return drainTimeoutMs;

	const logLevel = env[ENV_KEYS.logLevel];
	if (logLevel !== undefined && logLevel !== "" && !isLogLevel(logLevel)) {
		return Err(new ConfigError(`${ENV_KEYS.logLevel} must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`));
	}

	const mode = env[ENV_KEYS.mode];
	if (mode !== undefined && mode !== "" && !isDispatchMode(mode)) {
		return Err(new ConfigError(`${ENV_KEYS.mode} must be "development" or "production", got "${mode}"`));
	}

	const host = env[ENV_KEYS.host];

	return Ok(
		resolveConfig({
			port: port.value,
			host: host === undefined || host === "" ? undefined : host,
			maxBodyBytes: maxBodyBytes.value,
			drainTimeoutMs: drainTimeoutMs.value,
			logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
			mode: mode !== undefined && isDispatchMode(mode) ? mode : undefined,
		}),
	);
}
