import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { ConfigError, newRawMessage, type Message } from "@ferry/core";

import { connectToService, loadServiceRegistry, ServiceRegistry } from "./registry.ts";
import { listen } from "./transport.ts";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "ferry-registry-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeRegistry(name: string, contents: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, contents, "utf8");
  return path;
}

async function loadError(path: string): Promise<ConfigError> {
  const err = await loadServiceRegistry(path).catch((e: unknown) => e);
  if (!(err instanceof ConfigError)) throw new Error("expected a ConfigError");
  return err;
}

describe("ServiceRegistry", () => {
  it("registers and looks up services", () => {
    const registry = new ServiceRegistry();
    registry.register("billing", { host: "10.0.0.5", port: 6000 });
    registry.register("audit", { host: "audit.internal", port: 6001, readTimeoutMs: 250 });

    expect(registry.has("billing")).toBe(true);
    expect(registry.has("shipping")).toBe(false);
    expect(registry.lookup("audit")).toEqual({ host: "audit.internal", port: 6001, readTimeoutMs: 250 });
    expect(registry.names()).toEqual(["billing", "audit"]);
  });

  it("replaces a service registered twice", () => {
    const registry = new ServiceRegistry();
    registry.register("billing", { host: "old", port: 1 });
    registry.register("billing", { host: "new", port: 2 });
    expect(registry.lookup("billing")).toEqual({ host: "new", port: 2 });
    expect(registry.size).toBe(1);
  });

  it("rejects unknown names", () => {
    const registry = new ServiceRegistry();
    expect(() => registry.lookup("nope")).toThrow(new ConfigError('unknown service: "nope"'));
  });

  it("rejects empty names and invalid endpoints", () => {
    const registry = new ServiceRegistry();
    expect(() => registry.register(" ", { host: "h", port: 1 })).toThrow("service name must not be empty");
    expect(() => registry.register("bad", { host: "h", port: 0 })).toThrow(ConfigError);
    expect(registry.size).toBe(0);
  });
});

describe("loadServiceRegistry", () => {
  it("loads services and maps read_timeout_ms", async () => {
    const path = await writeRegistry(
      "good.json",
      JSON.stringify({
        services: {
          billing: { host: "10.0.0.5", port: 6000 },
          audit: { host: "127.0.0.1", port: 6001, read_timeout_ms: 5000 },
        },
      }),
    );

    const registry = await loadServiceRegistry(path);

    expect(registry.names()).toEqual(["billing", "audit"]);
    expect(registry.lookup("billing")).toEqual({ host: "10.0.0.5", port: 6000 });
    expect(registry.lookup("audit")).toEqual({ host: "127.0.0.1", port: 6001, readTimeoutMs: 5000 });
  });

  it("fails on a missing file", async () => {
    const path = join(dir, "missing.json");
    const error = await loadError(path);
    expect(error.message.startsWith(`cannot read service registry ${path}: `)).toBe(true);
  });

  it("fails on invalid JSON", async () => {
    const path = await writeRegistry("broken.json", "{ services: ");
    const error = await loadError(path);
    expect(error.message.startsWith(`service registry ${path} is not valid JSON: `)).toBe(true);
  });

  it("lists invalid entries by path", async () => {
    const path = await writeRegistry(
      "invalid.json",
      JSON.stringify({
        services: {
          billing: { host: "10.0.0.5", port: 99999 },
          audit: { host: "127.0.0.1", port: 6001, read_timeout_ms: 0 },
        },
      }),
    );

    const error = await loadError(path);
    expect(error.issues).toEqual([
      expect.stringMatching(/^services\.billing\.port: /),
      "services.audit.read_timeout_ms: read timeout must be positive",
    ]);
  });

  it("fails without a services section", async () => {
    const path = await writeRegistry("empty-object.json", "{}");
    const error = await loadError(path);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^services: /);
  });

  it("fails when no services are defined", async () => {
    const path = await writeRegistry("no-services.json", JSON.stringify({ services: {} }));
    const error = await loadError(path);
    expect(error.message).toBe(`service registry ${path} defines no services`);
  });
});

describe("connectToService", () => {
  it("connects to the registered endpoint", async () => {
    const received: Message[] = [];
    const listener = await listen("127.0.0.1", 0, (message) => {
      received.push(message);
    });
    const endpoint = listener.endpoint;
    if (!endpoint) throw new Error("listener did not bind");

    const registry = new ServiceRegistry();
    registry.register("echo", { host: "127.0.0.1", port: endpoint.port });

    const client = await connectToService(registry, "echo");
    await client.send(newRawMessage("via registry"));

    await vi.waitFor(() => expect(received).toEqual([newRawMessage("via registry")]));
    client.close();
    await listener.stop();
  });

  it("rejects an unregistered name", async () => {
    await expect(connectToService(new ServiceRegistry(), "ghost")).rejects.toThrow('unknown service: "ghost"');
  });
});
