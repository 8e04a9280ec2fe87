import { InvalidArgumentError } from "commander";

/**
 * Commander parser for --port
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer from 0 to 65535.");
  }
  return port;
}

/**
 * Commander parser for --path
 */
export function parseHealthPath(value: string): string {
  if (!value.startsWith("/")) {
    throw new InvalidArgumentError("Health path must start with '/'.");
  }
  return value;
}

export interface ServeOptions {
  port?: number;
  path?: string;
}
