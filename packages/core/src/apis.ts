/**
 * API enablement reconciler
 *
 * Enabling a service is asynchronous on the control plane side, so after the
 * enable request we poll the enabled-services listing until the API shows up.
 */

import { ApiEnablementTimeoutError, ApiEnableRequestError, describeCause } from './errors';
import { noopLogger } from './logger';
import { DEFAULT_POLLING, pollUntil, systemClock } from './poll';
import type {
  ApiEnablementResult,
  Clock,
  CloudProvisioningClient,
  PollingOptions,
  PrepLogger,
} from './types';

export interface ApiEnablementOptions {
  polling?: PollingOptions;
  clock?: Clock;
  logger?: PrepLogger;
  onPoll?: (api: string, attempt: number) => void;
  onEnabled?: (result: ApiEnablementResult) => void;
}

/**
 * Whether the listing shows the API. Case-insensitive substring match, since
 * the listing format differs between output formats.
 */
export function isApiListed(enabledServices: string[], apiName: string): boolean {
  const needle = apiName.trim().toLowerCase();
  if (!needle) {
    return false;
  }
  return enabledServices.some((service) => service.toLowerCase().includes(needle));
}

/**
 * Enable an API and wait until it is observed enabled
 */
export async function enableAndVerify(
  client: CloudProvisioningClient,
  projectId: string,
  apiName: string,
  options: ApiEnablementOptions = {}
): Promise<ApiEnablementResult> {
  const logger = options.logger ?? noopLogger;
  const polling = options.polling ?? DEFAULT_POLLING;

  logger.info(`Enabling ${apiName}`, { projectId });
  try {
    await client.enableService(projectId, apiName);
  } catch (error) {
    logger.error(`Enable request for ${apiName} failed`, error);
    throw new ApiEnableRequestError(apiName, error);
  }

  const outcome = await pollUntil(
    async (attempt) => {
      options.onPoll?.(apiName, attempt);
      try {
        const enabled = await client.listEnabledServices(projectId);
        return isApiListed(enabled, apiName);
      } catch (error) {
        // A failed listing is a poll that did not see the API
        logger.warn(`Listing services failed on attempt ${attempt}: ${describeCause(error)}`);
        return false;
      }
    },
    polling,
    options.clock ?? systemClock
  );

  if (!outcome.satisfied) {
    logger.error(`${apiName} not enabled after ${outcome.attempts} checks`);
    throw new ApiEnablementTimeoutError(apiName, outcome.attempts);
  }

  const result: ApiEnablementResult = { api: apiName, polls: outcome.attempts };
  logger.info(`${apiName} api is enabled`, { polls: outcome.attempts });
  options.onEnabled?.(result);
  return result;
}

/**
 * Enable APIs one after another, stopping at the first failure
 */
export async function enableAll(
  client: CloudProvisioningClient,
  projectId: string,
  apis: string[],
  options: ApiEnablementOptions = {}
): Promise<ApiEnablementResult[]> {
  const results: ApiEnablementResult[] = [];
  for (const api of apis) {
    results.push(await enableAndVerify(client, projectId, api, options));
  }
  return results;
}
