/**
 * Application configuration: CLI flags, environment variables, defaults.
 *
 * All parsing functions are pure (no side effects, deterministic output) and
 * return an `Error` instead of throwing. Only `buildConfig()` touches
 * `process`.
 *
 * Uses minimist for CLI argument parsing.
 */

import minimist from "minimist";
import { THEME_NAMES, type ThemeName } from "./styles/style_config.js";
import { readRelativeFile } from "./utils.js";

interface PackageManifest {
  version?: unknown;
}

function readVersion(): string {
  const manifest: PackageManifest = JSON.parse(readRelativeFile(import.meta.url, "..", "package.json"));
  return typeof manifest.version === "string" ? manifest.version : "0.0.0";
}

/**
 * Application version, read from package.json (single source of truth).
 */
export const VERSION: string = readVersion();

export interface ServerConfig {
  readonly httpPort: number;
  readonly transports: TransportType[];
  /** Alternative style configuration file; the shipped one when undefined. */
  readonly styleConfigPath: string | undefined;
}

export type TransportType = "stdio" | "http";

const DEFAULT_CONFIG: ServerConfig = {
  httpPort: 8080,
  transports: ["stdio"],
  styleConfigPath: undefined,
} as const;

const PORT_RANGE = {
  min: 1,
  max: 65535,
} as const;

export const parseHttpPortValue = (
  value: string | undefined,
): number | Error => {
  if (!value) {
    return new Error("--http-port flag requires a port number");
  }

  const port = Number(value.trim());

  if (!Number.isInteger(port)) {
    return new Error(`Invalid port number "${value}". Port must be a number`);
  }

  if (port < PORT_RANGE.min || port > PORT_RANGE.max) {
    return new Error(
      `Invalid port number "${value}". Port must be between ${PORT_RANGE.min} and ${PORT_RANGE.max}`,
    );
  }

  return port;
};

export const parseTransports = (
  values: string[] | undefined,
): TransportType[] | Error => {
  if (!values || values.length === 0) {
    return DEFAULT_CONFIG.transports;
  }

  const normalized = values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);

  if (normalized.length === 0) {
    return new Error("At least one transport must be specified");
  }

  const validTransports: TransportType[] = [];

  for (const value of normalized) {
    if (value === "stdio" || value === "http") {
      validTransports.push(value);
    } else {
      return new Error(
        `Invalid transport "${value}". Supported transports: stdio, http`,
      );
    }
  }

  // Remove duplicates while preserving order
  return Array.from(new Set(validTransports));
};

/**
 * Theme given on the command line. Unlike a descriptor's `theme`, an unknown
 * name here is an error.
 */
export const parseThemeName = (
  value: string | undefined,
): ThemeName | Error => {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (normalized.length === 0) {
    return "light";
  }
  const theme = THEME_NAMES.find((name) => name === normalized);
  if (theme === undefined) {
    return new Error(`Invalid theme "${value}". Supported themes: ${THEME_NAMES.join(", ")}`);
  }
  return theme;
};

export const shouldShowHelp = (args: readonly string[]): boolean => {
  return args.includes("--help") || args.includes("-h");
};

/**
 * minimist keeps a single value for a flag given once and an array for a
 * repeated flag; string flags given bare come back as "".
 */
export const flagValues = (value: unknown): string[] | undefined => {
  if (value === undefined) return undefined;
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values.map((item) => (typeof item === "string" ? item : String(item)));
};

/**
 * Parse command line arguments into a configuration object.
 * Repeated flags are last-wins.
 */
export const parseConfig = (
  args: readonly string[],
  env: Record<string, string | undefined> = {},
): ServerConfig | Error => {
  const parsed = minimist([...args], {
    string: ["http-port", "transport", "style-config"],
    boolean: ["help"],
    alias: { h: "help" },
  });

  const httpPortArr = flagValues(parsed["http-port"]);
  const transportArr = flagValues(parsed["transport"]);
  const styleConfigArr = flagValues(parsed["style-config"]);

  // Bare flags (--http-port with no value) come back as ""
  if (httpPortArr?.some((v) => v === "")) {
    return new Error("--http-port flag requires a port number");
  }
  if (transportArr?.some((v) => v === "")) {
    return new Error("--transport flag requires a transport name");
  }
  if (styleConfigArr?.some((v) => v === "")) {
    return new Error("--style-config flag requires a file path");
  }

  // ── HTTP port: CLI > env > default ──
  let httpPortValue = httpPortArr?.at(-1);
  if (httpPortValue === undefined && env.HTTP_PORT) {
    httpPortValue = env.HTTP_PORT;
  }
  let parsedHttpPort: number | undefined;
  if (httpPortValue !== undefined) {
    const httpPort = parseHttpPortValue(httpPortValue);
    if (httpPort instanceof Error) {
      return httpPort;
    }
    parsedHttpPort = httpPort;
  }

  // ── Transport: CLI > env > default ──
  const lastTransport = transportArr?.at(-1);
  let transportValues = lastTransport !== undefined ? [lastTransport] : undefined;
  if (transportValues === undefined && env.TRANSPORT) {
    transportValues = [env.TRANSPORT];
  }
  const transports = parseTransports(transportValues);
  if (transports instanceof Error) {
    return transports;
  }

  // ── Style configuration: CLI > env > shipped file ──
  const styleConfigPath = styleConfigArr?.at(-1) ?? (env.STYLE_CONFIG_PATH?.trim() || undefined);

  return {
    ...DEFAULT_CONFIG,
    httpPort: parsedHttpPort ?? DEFAULT_CONFIG.httpPort,
    transports,
    styleConfigPath,
  };
};

/**
 * Build configuration from the process.
 *
 * @param args - CLI arguments (defaults to `process.argv.slice(2)`)
 * @param env - environment variables (defaults to `process.env`)
 */
export const buildConfig = (
  args: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): ServerConfig | Error => {
  return parseConfig(args, env);
};
