import * as core from "@actions/core";
import { StabilityTimeoutError } from "./errors.js";
import type { EcsServiceInfo } from "./types.js";
import { sleep } from "./utils.js";

export interface StabilityOptions {
  /**
   * Seconds between two status checks.
   */
  interval: number;

  /**
   * Seconds to wait for the service to stabilise before giving up.
   */
  timeout: number;

  signal?: AbortSignal;
}

export type ServiceStatus = Pick<
  EcsServiceInfo,
  "serviceName" | "desiredCount" | "runningCount" | "deployments"
>;

/**
 * Wait for a service to reach a steady state
 *
 * This function polls the status of a service on a fixed interval until it
 * is stable, or the number of attempts afforded by the timeout is exhausted,
 * in which case a {@link StabilityTimeoutError} is thrown. Aborting the signal
 * rejects immediately, cancelling the pending wait.
 *
 * @param describe Retrieves the current status of the service
 * @param options  Polling interval, timeout and cancellation signal
 */
export async function waitForServiceStability(
  describe: () => Promise<ServiceStatus>,
  { interval, timeout, signal }: StabilityOptions,
) {
  const maxAttempts = Math.max(1, Math.ceil(timeout / interval));

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();

    const service = await describe();

    signal?.throwIfAborted();

    if (isServiceStable(service)) {
      core.info(`Service "${service.serviceName}" is stable`);

      return service;
    }

    core.debug(
      `Waiting for service "${service.serviceName}" to stabilise ` +
        `(attempt ${attempt}/${maxAttempts}): ` +
        `${service.runningCount}/${service.desiredCount} tasks running, ` +
        `${service.deployments.length} deployment(s) in progress`,
    );

    if (attempt < maxAttempts) {
      await sleep(interval * 1_000, signal);
    }
  }

  throw new StabilityTimeoutError(maxAttempts);
}

/**
 * Check if a service is stable.
 *
 * A service is stable once a single deployment remains and all of its desired
 * tasks are running. A deployment whose rollout failed will not recover on
 * its own, so it is reported as an error right away.
 *
 * @param service Service to check
 * @returns True if the service is stable, false otherwise
 */
export function isServiceStable(service: ServiceStatus) {
  const failed = service.deployments.find(
    (deployment) => deployment.rolloutState === "FAILED",
  );

  if (failed) {
    throw new Error(
      `Deployment ${failed.id} of service "${service.serviceName}" failed: ` +
        (failed.rolloutStateReason ?? "unknown reason"),
    );
  }

  return (
    service.deployments.length === 1 &&
    service.runningCount === service.desiredCount
  );
}

/**
 * Parse a timestamp printed by the AWS CLI
 */
export function parseTimestamp(timestamp: string | number) {
  const date =
    typeof timestamp === "number"
      ? new Date(timestamp * 1_000)
      : new Date(timestamp);

  if (isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp: ${timestamp}`);
  }

  return date;
}

/**
 * Determine when a service was last deployed
 *
 * The most recent update among all of its deployments is used; a service
 * without deployments has never been updated.
 */
export function lastDeploymentTime(service: Pick<ServiceStatus, "deployments">) {
  return service.deployments
    .map((deployment) => parseTimestamp(deployment.updatedAt))
    .reduce<Date>(
      (latest, date) => (date > latest ? date : latest),
      new Date(0),
    );
}
