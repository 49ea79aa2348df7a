/**
 * Telemetry - logging and metrics around provider calls
 */

import { randomUUID } from 'crypto';
import { toGatewayError } from '../errors.js';
import type { TokenUsage } from '../providers/base.js';
import { log, PerformanceTimer, createRequestLogger } from '../utils/logger.js';
import { MetricsTracker, tokensTotal } from './metrics.js';

// Usage field names differ per provider family
const USAGE_FIELDS: ReadonlyArray<readonly [field: string, type: 'input' | 'output']> = [
  ['prompt_tokens', 'input'],
  ['completion_tokens', 'output'],
  ['input_tokens', 'input'],
  ['output_tokens', 'output'],
  ['promptTokenCount', 'input'],
  ['candidatesTokenCount', 'output'],
];

export function recordUsage(provider: string, model: string, usage: TokenUsage | undefined): void {
  if (!usage) {
    return;
  }
  for (const [field, type] of USAGE_FIELDS) {
    const value = usage[field];
    if (typeof value === 'number' && value > 0) {
      tokensTotal.inc({ provider, model, type }, value);
    }
  }
}

/**
 * Non-streaming provider call telemetry wrapper
 */
export async function withProviderTelemetry<T>(
  provider: string,
  model: string,
  fn: () => Promise<T>
): Promise<T> {
  const logger = createRequestLogger(randomUUID());
  const perfTimer = new PerformanceTimer(`provider:${provider}:${model}`);
  const metricsTracker = new MetricsTracker(provider, model, 'full');

  logger.debug(`Provider request started: ${provider}/${model}`, { provider, model });

  try {
    const result = await fn();
    const duration = perfTimer.end({ status: 'success' });
    metricsTracker.success();

    logger.debug(`Provider request completed: ${provider}/${model}`, {
      provider,
      model,
      duration,
      status: 'success',
    });

    return result;
  } catch (error) {
    const failure = toGatewayError(error, provider);
    const duration = perfTimer.end({ status: 'failure' });
    metricsTracker.failure(failure.kind);

    log.error(`Provider request failed: ${provider}/${model}`, failure, {
      provider,
      model,
      kind: failure.kind,
      duration,
    });

    throw failure;
  }
}

export * from './metrics.js';
