/**
 * Server adapter on Node's http/https servers.
 *
 * Requests go through @hono/node-server's request listener, so any
 * Hono app (or other fetch handler) can be mounted as the dispatch target.
 * Options other than `ip` and the TLS material are ignored here.
 */

import { readFile } from "node:fs/promises";
import { createServer, type Server } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import { getRequestListener } from "@hono/node-server";
import type { Logger } from "@portico/core/logger";
import type {
  AdapterListenerOptions,
  AdapterScheme,
  FetchHandler,
  ListenerHandle,
  ServerAdapter,
  StartListenerResult,
} from "./types.js";

interface TlsMaterial {
  key: string | Buffer;
  cert: string | Buffer;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

async function loadTlsMaterial(
  options: AdapterListenerOptions,
): Promise<TlsMaterial | null> {
  const key =
    options.key ??
    (options.keyfile ? await readFile(options.keyfile) : undefined);
  const cert =
    options.cert ??
    (options.certfile ? await readFile(options.certfile) : undefined);
  if (key === undefined || cert === undefined) return null;
  return { key, cert };
}

function listen(server: Server, port: number, ip?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, ip, () => {
      server.removeListener("error", reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export interface NodeServerAdapterOptions {
  /** Receives errors a bound server raises after it started listening. */
  logger: Logger;
}

export class NodeServerAdapter implements ServerAdapter {
  protected readonly servers = new Map<string, Server>();
  private readonly logger: Logger;

  constructor(options: NodeServerAdapterOptions) {
    this.logger = options.logger;
  }

  async startListener(
    scheme: AdapterScheme,
    ref: string,
    dispatch: FetchHandler,
    options: AdapterListenerOptions,
  ): Promise<StartListenerResult> {
    if (this.servers.has(ref)) {
      return {
        ok: false,
        error: { kind: "other", reason: `Listener ${ref} is already running` },
      };
    }

    const requestListener = getRequestListener(dispatch);
    let server: Server;
    if (scheme === "secure") {
      let tls: TlsMaterial | null;
      try {
        tls = await loadTlsMaterial(options);
      } catch (err) {
        return {
          ok: false,
          error: { kind: "other", reason: reasonOf(err), cause: err },
        };
      }
      if (!tls) {
        return {
          ok: false,
          error: {
            kind: "other",
            reason:
              "Secure listener requires key and cert (or keyfile and certfile)",
          },
        };
      }
      try {
        server = createHttpsServer(tls, requestListener);
      } catch (err) {
        // Malformed PEM is rejected here, before anything binds
        return {
          ok: false,
          error: { kind: "other", reason: reasonOf(err), cause: err },
        };
      }
    } else {
      server = createServer(requestListener);
    }

    try {
      await listen(server, options.port, options.ip);
    } catch (err) {
      if (isErrnoException(err) && err.code === "EADDRINUSE") {
        return {
          ok: false,
          error: { kind: "address-in-use", port: options.port },
        };
      }
      return {
        ok: false,
        error: { kind: "other", reason: reasonOf(err), cause: err },
      };
    }

    server.on("error", (err) => {
      this.logger.error({ err, ref }, "Listener error");
    });
    this.servers.set(ref, server);
    const address = server.address();
    const handle: ListenerHandle = {
      ref,
      scheme,
      port:
        address && typeof address !== "string" ? address.port : options.port,
      close: () => this.stopListener(ref),
    };
    return { ok: true, handle };
  }

  async stopListener(ref: string): Promise<void> {
    const server = this.servers.get(ref);
    if (!server) return;
    this.servers.delete(ref);
    await close(server);
  }

  /** Refs of listeners currently bound. */
  refs(): string[] {
    return [...this.servers.keys()];
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
