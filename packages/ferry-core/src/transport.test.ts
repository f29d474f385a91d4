import { describe, expect, it } from "vitest";
import { formatEndpoint } from "./transport.ts";

describe("formatEndpoint", () => {
  it("joins host and port", () => {
    expect(formatEndpoint({ host: "127.0.0.1", port: 6789 })).toBe("127.0.0.1:6789");
    expect(formatEndpoint({ host: "memory", port: 1 })).toBe("memory:1");
  });

  it("brackets IPv6 hosts", () => {
    expect(formatEndpoint({ host: "::1", port: 443 })).toBe("[::1]:443");
  });
});
