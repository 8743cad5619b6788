import type {
  AdapterListenerOptions,
  AdapterScheme,
  FetchHandler,
  ListenerStartFailure,
  ServerAdapter,
  StartListenerResult,
} from "../adapter/types.js";

export interface StartCall {
  scheme: AdapterScheme;
  ref: string;
  dispatch: FetchHandler;
  options: AdapterListenerOptions;
}

/**
 * In-process adapter that binds nothing. Start failures can be queued
 * per ref, either as a returned failure or a thrown error; stop failures
 * per ref too.
 */
export class FakeServerAdapter implements ServerAdapter {
  readonly startCalls: StartCall[] = [];
  readonly stopCalls: string[] = [];
  readonly bound = new Set<string>();
  private readonly startFailures = new Map<string, ListenerStartFailure>();
  private readonly startErrors = new Map<string, Error>();
  private readonly stopFailures = new Map<string, Error>();

  failStart(ref: string, failure: ListenerStartFailure): void {
    this.startFailures.set(ref, failure);
  }

  throwOnStart(ref: string, error: Error): void {
    this.startErrors.set(ref, error);
  }

  failStop(ref: string, error: Error): void {
    this.stopFailures.set(ref, error);
  }

  async startListener(
    scheme: AdapterScheme,
    ref: string,
    dispatch: FetchHandler,
    options: AdapterListenerOptions,
  ): Promise<StartListenerResult> {
    this.startCalls.push({ scheme, ref, dispatch, options });

    const thrown = this.startErrors.get(ref);
    if (thrown) throw thrown;

    const failure = this.startFailures.get(ref);
    if (failure) return { ok: false, error: failure };

    this.bound.add(ref);
    return {
      ok: true,
      handle: {
        ref,
        scheme,
        port: options.port,
        close: () => this.stopListener(ref),
      },
    };
  }

  async stopListener(ref: string): Promise<void> {
    this.stopCalls.push(ref);
    const failure = this.stopFailures.get(ref);
    if (failure) throw failure;
    this.bound.delete(ref);
  }
}
