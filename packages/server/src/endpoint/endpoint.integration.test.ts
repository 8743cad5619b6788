import { afterEach, describe, expect, it } from "vitest";
import pino from "pino";
import { MemoryConfigSource } from "@portico/core/config";
import { ListenerStartError, PortInUseError } from "@portico/core/errors";
import { NodeServerAdapter } from "../adapter/node.js";
import { createEndpointApp } from "../app.js";
import { EndpointManager } from "./manager.js";

const logger = pino({ level: "silent" });

describe("EndpointManager with NodeServerAdapter", () => {
  const managers: EndpointManager[] = [];

  afterEach(async () => {
    for (const manager of managers.splice(0)) {
      await manager.stopAll();
    }
  });

  function setup(overrides: Record<string, unknown>) {
    const source = new MemoryConfigSource({
      shop: { "Shop.Endpoint": overrides },
    });
    const manager = new EndpointManager({
      adapter: new NodeServerAdapter({ logger }),
      source,
      logger,
    });
    managers.push(manager);
    const app = createEndpointApp({
      endpointId: "Shop.Endpoint",
      logger,
      version: "0.1.0",
      startedAt: new Date(),
      getConfig: () => manager.config("Shop.Endpoint"),
    });
    return { manager, app };
  }

  it("serves the endpoint app until stopped", async () => {
    const { manager, app } = setup({
      url: { host: "shop.example", port: 443, scheme: "https" },
      http: { port: 0, ip: "127.0.0.1" },
    });

    await manager.start("shop", "Shop.Endpoint", app.fetch);
    const [listener] = manager.listeners("Shop.Endpoint");

    const res = await fetch(`http://127.0.0.1:${listener.port}/health`);
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body.url).toBe("https://shop.example");

    await manager.stop("Shop.Endpoint");

    await expect(
      fetch(`http://127.0.0.1:${listener.port}/health`),
    ).rejects.toThrow();
  });

  it("rejects with PortInUseError when another endpoint holds the port", async () => {
    const first = setup({ http: { port: 0, ip: "127.0.0.1" } });
    await first.manager.start("shop", "Shop.Endpoint", first.app.fetch);
    const [listener] = first.manager.listeners("Shop.Endpoint");

    const second = setup({ http: { port: listener.port, ip: "127.0.0.1" } });
    const started = second.manager.start("shop", "Shop.Endpoint", second.app.fetch);

    await expect(started).rejects.toBeInstanceOf(PortInUseError);
    await expect(started).rejects.toMatchObject({ port: listener.port });
    expect(second.manager.state("Shop.Endpoint")).toBe("unregistered");
  });

  it("rejects with ListenerStartError for malformed TLS material", async () => {
    const { manager, app } = setup({
      http: { port: 0, ip: "127.0.0.1" },
      https: { port: 0, key: "not a key", cert: "not a cert" },
    });

    const started = manager.start("shop", "Shop.Endpoint", app.fetch);

    await expect(started).rejects.toBeInstanceOf(ListenerStartError);
    expect(manager.state("Shop.Endpoint")).toBe("unregistered");
    expect(manager.listeners("Shop.Endpoint")).toEqual([]);
  });
});
