import * as core from "@actions/core";
import {
  ChangeSetEmptyError,
  ForceUpdateError,
  ForceUpdateTimeoutError,
  ProvisioningError,
  StabilityTimeoutError,
} from "./errors.js";
import type { StackConfiguration } from "./stack.js";

export interface SubmitStackOptions {
  disableRollback: boolean;
  tags: Record<string, string>;
}

/**
 * Provisioning backend operations the deployer drives.
 */
export interface DeployerDependencies {
  /**
   * Create or update a stack. Rejects with a {@link ChangeSetEmptyError} if
   * the stack is already up to date.
   */
  submitStack(
    stackName: string,
    document: string,
    bucket: string,
    options: SubmitStackOptions,
  ): Promise<void>;

  lastUpdatedAt(app: string, env: string, workload: string): Promise<Date>;

  /**
   * Restart the running tasks of a service and wait until it is stable.
   * Rejects with a {@link StabilityTimeoutError} if the service does not
   * stabilise in time.
   */
  forceUpdate(
    app: string,
    env: string,
    workload: string,
    signal?: AbortSignal,
  ): Promise<void>;
}

export type DeployState =
  | "idle"
  | "submitted"
  | "applied"
  | "change-set-empty"
  | "failed"
  | "checking-staleness"
  | "skipped"
  | "force-updating"
  | "completed"
  | "timed-out";

export const deployTransitions: Readonly<
  Record<DeployState, readonly DeployState[]>
> = {
  idle: ["submitted"],
  submitted: ["applied", "change-set-empty", "failed"],
  applied: [],
  "change-set-empty": ["checking-staleness"],
  "checking-staleness": ["skipped", "force-updating", "failed"],
  skipped: [],
  "force-updating": ["completed", "timed-out", "failed"],
  completed: [],
  "timed-out": [],
  failed: [],
};

export type DeployOutcome =
  | "applied"
  | "no-changes"
  | "force-update-skipped"
  | "force-updated";

export interface DeployResult {
  outcome: DeployOutcome;
  stackName: string;
  transitions: DeployState[];
  details: string;
}

export interface DeployStackOptions {
  /**
   * When the deployment was invoked. Services updated at or after this time
   * are considered current and not force-updated again.
   */
  startedAt: Date;
  signal?: AbortSignal;
}

/**
 * Tracks the state of a single stack deployment, rejecting transitions the
 * deployment flow does not allow.
 */
export class DeployStateMachine {
  #state: DeployState = "idle";
  readonly #history: DeployState[] = ["idle"];

  get state() {
    return this.#state;
  }

  get history(): DeployState[] {
    return [...this.#history];
  }

  transition(target: DeployState) {
    if (!deployTransitions[this.#state].includes(target)) {
      throw new Error(
        `Invalid deployment state transition: ${this.#state} -> ${target}`,
      );
    }

    core.debug(`Deployment state: ${this.#state} -> ${target}`);
    this.#state = target;
    this.#history.push(target);
  }
}

/**
 * Deploy a rendered stack
 *
 * Submits the stack to the provisioning backend. If the backend reports that
 * the stack has no changes and a new update was requested, the running tasks
 * are restarted instead, unless the service has been updated since the
 * deployment was invoked.
 *
 * @param configuration The stack configuration the document was rendered from
 * @param document      The rendered stack template
 * @param dependencies  Provisioning backend operations
 * @param options       Invocation time and cancellation signal
 */
export async function deployStack(
  configuration: StackConfiguration,
  document: string,
  dependencies: DeployerDependencies,
  { startedAt, signal }: DeployStackOptions,
): Promise<DeployResult> {
  const { stackName, workload, application, environment } = configuration;
  const machine = new DeployStateMachine();
  const result = (outcome: DeployOutcome, details: string): DeployResult => ({
    outcome,
    stackName,
    transitions: machine.history,
    details,
  });

  machine.transition("submitted");

  try {
    await dependencies.submitStack(stackName, document, configuration.bucket, {
      disableRollback: configuration.disableRollback,
      tags: configuration.tags,
    });
  } catch (cause) {
    if (!(cause instanceof ChangeSetEmptyError)) {
      machine.transition("failed");

      throw new ProvisioningError("deploy failed", cause);
    }

    machine.transition("change-set-empty");
  }

  if (machine.state === "submitted") {
    machine.transition("applied");
    core.info(`Deployed stack ${stackName}`);

    return result("applied", `Stack ${stackName} was updated`);
  }

  if (!configuration.forceUpdate) {
    core.info(`Stack ${stackName} is already up to date`);

    return result("no-changes", `Stack ${stackName} has no changes`);
  }

  machine.transition("checking-staleness");

  let lastUpdatedAt: Date;

  try {
    lastUpdatedAt = await dependencies.lastUpdatedAt(
      application,
      environment,
      workload,
    );
  } catch (cause) {
    machine.transition("failed");

    throw new ProvisioningError(
      `get the last updated deployment time for ${workload}`,
      cause,
    );
  }

  if (lastUpdatedAt.getTime() >= startedAt.getTime()) {
    machine.transition("skipped");
    core.info(
      `Service ${workload} was updated at ${lastUpdatedAt.toISOString()}, ` +
        "after this deployment started; skipping the forced update",
    );

    return result(
      "force-update-skipped",
      `Service ${workload} is already running the latest configuration`,
    );
  }

  machine.transition("force-updating");
  core.info(
    `Forcing an update for service ${workload} from environment ${environment}`,
  );

  try {
    await dependencies.forceUpdate(application, environment, workload, signal);
  } catch (cause) {
    if (cause instanceof StabilityTimeoutError) {
      machine.transition("timed-out");

      const guidance =
        `Run "aws ecs describe-services" for service ${workload} in ` +
        `environment ${environment} to check for the failure reason.`;

      core.error(
        `Timed out waiting for service ${workload} from environment ` +
          `${environment} to stabilise. ${guidance}`,
      );

      throw new ForceUpdateTimeoutError(workload, cause, guidance);
    }

    machine.transition("failed");

    throw new ForceUpdateError(workload, cause);
  }

  machine.transition("completed");
  core.info(
    `Forced an update for service ${workload} from environment ${environment}`,
  );

  return result(
    "force-updated",
    `Restarted the running tasks of service ${workload}`,
  );
}
