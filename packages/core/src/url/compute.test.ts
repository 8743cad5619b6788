import { describe, it, expect } from "vitest";
import { EndpointConfigSchema } from "../schemas/endpoint-config.js";
import { computeUrl } from "./compute.js";

function parse(sections: Record<string, unknown>) {
  return EndpointConfigSchema.parse({
    appId: "shop",
    renderErrors: "Shop.ErrorView",
    ...sections,
  });
}

describe("computeUrl", () => {
  it("falls back to http on port 80", () => {
    expect(computeUrl(parse({}))).toBe("http://localhost");
  });

  it("omits 443 for https", () => {
    const config = parse({
      url: { host: "example.com" },
      https: { port: 443 },
    });
    expect(computeUrl(config)).toBe("https://example.com");
  });

  it("omits 80 for http", () => {
    const config = parse({ url: { host: "example.com" }, http: { port: 80 } });
    expect(computeUrl(config)).toBe("http://example.com");
  });

  it("renders a non-default http port", () => {
    const config = parse({
      url: { host: "example.com" },
      http: { port: 4000 },
    });
    expect(computeUrl(config)).toBe("http://example.com:4000");
  });

  it("prefers https over http", () => {
    const config = parse({
      url: { host: "example.com" },
      http: { port: 80 },
      https: { port: 8443 },
    });
    expect(computeUrl(config)).toBe("https://example.com:8443");
  });

  it("lets an explicit url section win over derived scheme and port", () => {
    const config = parse({
      url: { host: "example.com", scheme: "https", port: 8443 },
      http: { port: 80 },
    });
    expect(computeUrl(config)).toBe("https://example.com:8443");
  });

  it("keeps the derived port when only url.scheme is set", () => {
    const config = parse({
      url: { host: "example.com", scheme: "https" },
      http: { port: 443 },
    });
    expect(computeUrl(config)).toBe("https://example.com");
  });

  it("renders the start default when a section leaves the port unset", () => {
    const config = parse({ http: {} });
    expect(computeUrl(config)).toBe("http://localhost:4000");
  });

  it("accepts a string url port", () => {
    const config = parse({ url: { host: "example.com", port: "80" } });
    expect(computeUrl(config)).toBe("http://example.com");
  });

  it("does not carry a port across schemes", () => {
    const config = parse({
      url: { host: "example.com", scheme: "http" },
      https: { port: 443 },
    });
    expect(computeUrl(config)).toBe("http://example.com:443");
  });

  it("appends url.path", () => {
    const config = parse({
      url: { host: "example.com", path: "/shop" },
      https: { port: 443 },
    });
    expect(computeUrl(config)).toBe("https://example.com/shop");
  });
});
