import { describe, it, expect } from "vitest";
import { buildDefaults, errorViewFor } from "./defaults.js";

describe("errorViewFor", () => {
  it("uses the first namespace segment", () => {
    expect(errorViewFor("Shop.Web.Endpoint")).toBe("Shop.ErrorView");
  });

  it("handles an id without namespaces", () => {
    expect(errorViewFor("endpoint")).toBe("endpoint.ErrorView");
  });
});

describe("buildDefaults", () => {
  it("returns the static endpoint defaults", () => {
    expect(buildDefaults("shop", "Shop.Endpoint")).toEqual({
      appId: "shop",
      debugErrors: false,
      renderErrors: "Shop.ErrorView",
      transports: { longpollerWindowMs: 10_000, websocketSerializer: "json" },
      url: { host: "localhost" },
      http: false,
      https: false,
      secretKeyBase: null,
    });
  });

  it("returns fresh section objects on every call", () => {
    const first = buildDefaults("shop", "Shop.Endpoint");
    first.url.host = "changed.example";

    expect(buildDefaults("shop", "Shop.Endpoint").url.host).toBe("localhost");
  });
});
