import type { ComputeCommandResult, WebhookComputeConfig } from '@gantry/shared';
import { LifecycleControlError, errorMessage } from '../../errors.js';
import type { ComputeAction } from '../compute.js';

/**
 * Start or stop capacity through an HTTP control plane
 *
 * Supports template substitution in the request body.
 */
export async function webhookCompute(
  config: WebhookComputeConfig,
  action: ComputeAction
): Promise<ComputeCommandResult> {
  const call = action === 'start' ? config.start : config.stop;

  const method = call.method ?? 'POST';
  const headers = {
    'Content-Type': 'application/json',
    'User-Agent': 'gantry-dispatcher',
    ...(call.headers ?? {}),
  };

  let body: string | undefined;
  if (call.bodyTemplate) {
    body = substituteTemplate(call.bodyTemplate, {
      action,
      instance: config.instance ?? '',
      timestamp: new Date().toISOString(),
    });
  }

  const timeoutMs = config.timeoutMs ?? 30000;
  const successCodes = config.successCodes ?? [200, 201, 202, 204];

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    response = await fetch(call.url, {
      method,
      headers,
      body,
      signal: controller.signal,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new LifecycleControlError(`${action} webhook timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw new LifecycleControlError(`${action} webhook failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!successCodes.includes(response.status)) {
    const errorText = await response.text();
    throw new LifecycleControlError(
      `${action} webhook returned unexpected status ${response.status}${errorText ? `: ${errorText}` : ''}`
    );
  }

  return {
    mechanism: 'webhook',
    message: `${action} webhook accepted (status ${response.status})`,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Replace {{key}} placeholders with values from the context
 */
export function substituteTemplate(template: string, context: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => context[key] ?? match);
}
