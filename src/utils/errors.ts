export class AppError extends Error {
  constructor(
    public message: string,
    public code?: string,
    public isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
  }
}

export class NetworkError extends AppError {
  constructor(message: string, public statusCode?: number) {
    super(message, 'NETWORK_ERROR');
  }
}

/**
 * The node set could not be enumerated. The only failure that aborts a
 * dispatch round.
 */
export class DiscoveryError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(message, 'DISCOVERY_ERROR');
  }
}

export class TunnelError extends AppError {
  constructor(message: string, public relayId?: string) {
    super(message, 'TUNNEL_ERROR');
  }
}

export class ConnectionError extends AppError {
  constructor(message: string, public host?: string) {
    super(message, 'CONNECTION_ERROR');
  }
}

export class DispatchTimeoutError extends AppError {
  constructor(message: string, public timeoutMs: number) {
    super(message, 'DISPATCH_TIMEOUT');
  }
}

/**
 * The command ran but did not succeed. Whatever it printed before failing is
 * kept in `partialOutput`.
 */
export class CommandError extends AppError {
  constructor(
    message: string,
    public exitCode: number | null = null,
    public partialOutput?: string
  ) {
    super(message, 'COMMAND_ERROR');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
