/**
 * Typed error catalog for endpoint configuration and listener lifecycle.
 */

export class EndpointError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Listener start failures

export class PortInUseError extends EndpointError {
  constructor(
    public readonly port: number,
    details?: Record<string, unknown>,
  ) {
    super("PORT_IN_USE", `Port ${port} is already in use`, {
      port,
      ...details,
    });
  }
}

export class ListenerStartError extends EndpointError {
  constructor(
    public readonly reason: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(
      "LISTENER_START_FAILED",
      `Something went wrong while starting endpoint: ${reason}`,
      { reason, ...details },
      { cause },
    );
  }
}

// Registry errors

export class EndpointAlreadyRegisteredError extends EndpointError {
  constructor(public readonly endpointId: string) {
    super(
      "ENDPOINT_ALREADY_REGISTERED",
      `Endpoint ${endpointId} is already registered`,
      { endpoint: endpointId },
    );
  }
}

export class EndpointNotRegisteredError extends EndpointError {
  constructor(public readonly endpointId: string) {
    super(
      "ENDPOINT_NOT_REGISTERED",
      `Endpoint ${endpointId} is not registered`,
      { endpoint: endpointId },
    );
  }
}

// Configuration errors

export interface ConfigIssue {
  path: string;
  message: string;
}

export class InvalidConfigError extends EndpointError {
  constructor(
    public readonly endpointId: string,
    public readonly issues: ConfigIssue[],
  ) {
    super(
      "INVALID_CONFIG",
      `Invalid configuration for endpoint ${endpointId}`,
      { endpoint: endpointId, issues },
    );
  }
}

export class InvalidConfigFileError extends EndpointError {
  constructor(
    public readonly configPath: string,
    public readonly issues: ConfigIssue[],
    cause?: unknown,
  ) {
    super(
      "INVALID_CONFIG_FILE",
      `Invalid configuration file ${configPath}`,
      { configPath, issues },
      { cause },
    );
  }
}
