// Named services resolved from a JSON file.
//
// {
//   "services": {
//     "billing": { "host": "10.0.0.5", "port": 6000, "read_timeout_ms": 5000 }
//   }
// }

import { readFile } from "node:fs/promises";
import { getLogger } from "@logtape/logtape";
import { z } from "zod";
import {
  ConfigError,
  EndpointConfigSchema,
  formatIssues,
  parseEndpointConfig,
  type ConnectionHandler,
  type ConnectionOptions,
  type EndpointConfig,
} from "@ferry/core";
import { connectEndpoint } from "./transport.ts";

const logger = getLogger(["ferry", "registry"]);

const ServiceEntrySchema = z
  .object({
    host: EndpointConfigSchema.shape.host,
    port: EndpointConfigSchema.shape.port,
    read_timeout_ms: EndpointConfigSchema.shape.readTimeoutMs,
  })
  .transform(
    ({ host, port, read_timeout_ms }): EndpointConfig =>
      read_timeout_ms === undefined ? { host, port } : { host, port, readTimeoutMs: read_timeout_ms },
  );

const ServiceFileSchema = z.object({
  services: z.record(z.string(), ServiceEntrySchema),
});

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Service names mapped to the endpoints that serve them. */
export class ServiceRegistry {
  private readonly services = new Map<string, EndpointConfig>();

  get size(): number {
    return this.services.size;
  }

  /**
   * Register or replace a service.
   *
   * @throws ConfigError if the name is empty or the endpoint is invalid
   */
  register(name: string, config: EndpointConfig): void {
    if (name.trim() === "") {
      throw new ConfigError("service name must not be empty");
    }
    this.services.set(name, parseEndpointConfig(config));
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  /** @throws ConfigError if no service has this name */
  lookup(name: string): EndpointConfig {
    const config = this.services.get(name);
    if (!config) {
      throw new ConfigError(`unknown service: ${JSON.stringify(name)}`);
    }
    return config;
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.services.keys()];
  }
}

/**
 * Load a registry from a JSON file.
 *
 * @throws ConfigError if the file cannot be read or parsed, an entry is
 *   invalid, or it defines no services
 */
export async function loadServiceRegistry(path: string): Promise<ServiceRegistry> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new ConfigError(`cannot read service registry ${path}: ${describe(e)}`, [], { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`service registry ${path} is not valid JSON: ${describe(e)}`, [], { cause: e });
  }

  const result = ServiceFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ConfigError(`invalid service registry ${path}: ${issues.join("; ")}`, issues, {
      cause: result.error,
    });
  }

  const registry = new ServiceRegistry();
  for (const [name, config] of Object.entries(result.data.services)) {
    registry.register(name, config);
  }
  if (registry.size === 0) {
    throw new ConfigError(`service registry ${path} defines no services`);
  }

  logger.debug("loaded {count} services from {path}", { count: registry.size, path });
  return registry;
}

/**
 * Connect to a registered service using its endpoint and read timeout.
 *
 * @throws ConfigError if the service is not registered
 */
export async function connectToService(
  registry: ServiceRegistry,
  name: string,
  options: ConnectionOptions = {},
): Promise<ConnectionHandler> {
  return connectEndpoint(registry.lookup(name), options);
}
