/**
 * Gateway error taxonomy.
 *
 * Every failure the gateway reports carries a `kind`, which is also what a
 * stream's terminal `failed` event exposes to consumers.
 */

export type GatewayErrorKind =
  | 'unsupported_provider'
  | 'provider_http'
  | 'malformed_response'
  | 'stream_decode'
  | 'transport'
  | 'configuration';

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(
    message: string,
    readonly provider: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedProviderError extends GatewayError {
  readonly kind = 'unsupported_provider' as const;

  constructor(provider: string) {
    super(`Unsupported provider: ${provider}`, provider);
  }
}

/**
 * Non-2xx answer from a provider. The raw body is kept as-is; nothing is parsed.
 */
export class ProviderHttpError extends GatewayError {
  readonly kind = 'provider_http' as const;

  constructor(
    provider: string,
    readonly statusCode: number,
    readonly body: string
  ) {
    super(`${provider} API error: ${statusCode} ${body}`, provider);
  }
}

export class MalformedResponseError extends GatewayError {
  readonly kind = 'malformed_response' as const;

  constructor(provider: string, detail: string, options?: { cause?: unknown }) {
    super(`Malformed ${provider} response: ${detail}`, provider, options);
  }
}

export class StreamDecodeError extends GatewayError {
  readonly kind = 'stream_decode' as const;

  constructor(provider: string, detail: string, options?: { cause?: unknown }) {
    super(`Could not decode ${provider} stream: ${detail}`, provider, options);
  }
}

export class ProviderTransportError extends GatewayError {
  readonly kind = 'transport' as const;

  constructor(provider: string, cause: unknown) {
    super(
      `${provider} request failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      provider,
      { cause }
    );
  }
}

export class MissingCredentialsError extends GatewayError {
  readonly kind = 'configuration' as const;

  constructor(provider: string, envVar: string) {
    super(
      `${provider} API key is required. Set ${envVar} environment variable or provide it in config.`,
      provider
    );
  }
}

/**
 * Maps anything thrown while talking to a provider onto the taxonomy.
 * Errors that are not already gateway errors come from the transport.
 */
export function toGatewayError(error: unknown, provider: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new ProviderTransportError(provider, error);
}
