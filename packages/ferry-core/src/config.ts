// Validated endpoint configuration.

import { z } from "zod";
import { ConfigError } from "./errors.ts";

const hostSchema = z.string().trim().min(1, "host must not be empty");

const readTimeoutSchema = z
  .number()
  .int("read timeout must be a whole number of milliseconds")
  .positive("read timeout must be positive")
  .optional();

/** Endpoint to connect to. */
export const EndpointConfigSchema = z.object({
  host: hostSchema,
  port: z.number().int().min(1).max(65535),
  readTimeoutMs: readTimeoutSchema,
});

/** Endpoint to listen on. Port 0 asks the OS for a free port. */
export const ListenConfigSchema = EndpointConfigSchema.extend({
  port: z.number().int().min(0).max(65535),
});

export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type ListenConfig = z.infer<typeof ListenConfigSchema>;

/** Render zod issues as `path: message` lines. */
export function formatIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ConfigError(`invalid ${what} configuration: ${issues.join("; ")}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Validate an endpoint to connect to.
 *
 * @throws ConfigError listing every problem
 */
export function parseEndpointConfig(input: unknown): EndpointConfig {
  return parseWith(EndpointConfigSchema, input, "endpoint");
}

/**
 * Validate an endpoint to listen on.
 *
 * @throws ConfigError listing every problem
 */
export function parseListenConfig(input: unknown): ListenConfig {
  return parseWith(ListenConfigSchema, input, "listen");
}
