import type { ListenerOptions } from "@portico/core/schemas";

/** Request handler every listener dispatches to (Hono's `app.fetch`). */
export type FetchHandler = (request: Request) => Response | Promise<Response>;

/** `plain` binds HTTP, `secure` binds HTTPS. */
export type AdapterScheme = "plain" | "secure";

export type AdapterListenerOptions = ListenerOptions & { port: number };

export interface ListenerHandle {
  ref: string;
  scheme: AdapterScheme;
  /** Port actually bound; differs from the requested one when that was 0. */
  port: number;
  close: () => Promise<void>;
}

export type ListenerStartFailure =
  | { kind: "address-in-use"; port: number }
  | { kind: "other"; reason: string; cause?: unknown };

export type StartListenerResult =
  | { ok: true; handle: ListenerHandle }
  | { ok: false; error: ListenerStartFailure };

/**
 * Binds and releases sockets on behalf of the endpoint manager.
 * Start failures are returned, not thrown.
 */
export interface ServerAdapter {
  startListener(
    scheme: AdapterScheme,
    ref: string,
    dispatch: FetchHandler,
    options: AdapterListenerOptions,
  ): Promise<StartListenerResult>;
  /** Best effort. Stopping an unknown ref is a no-op. */
  stopListener(ref: string): Promise<void>;
}
