import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_PORT = 8069;

/** Seconds */
export const DEFAULT_TIMEOUT = 120;

const portSchema = z
  .union([z.number().int(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(0).max(65535));

/** Longest timeout a Node timer holds, in seconds (2^31 - 1 ms) */
export const MAX_TIMEOUT = 2_147_483;

const timeoutSchema = z.number().positive().max(MAX_TIMEOUT);

/**
 * Validate a port given as a number or an integer-like string
 * @throws {ConfigurationError} when the value is not an integer in 0..65535
 */
export function parsePort(port: unknown): number {
  const parsed = portSchema.safeParse(port);
  if (!parsed.success) {
    throw new ConfigurationError(`The port '${String(port)}' is invalid. An integer is required.`);
  }
  return parsed.data;
}

/**
 * Validate a timeout in seconds
 * @throws {ConfigurationError} when the value is not a positive number up to {@link MAX_TIMEOUT}
 */
export function parseTimeout(timeout: unknown): number {
  const parsed = timeoutSchema.safeParse(timeout);
  if (!parsed.success) {
    throw new ConfigurationError(
      `The timeout '${String(timeout)}' is invalid. A positive number of seconds up to ${MAX_TIMEOUT} is required.`
    );
  }
  return parsed.data;
}
