/**
 * Base class for errors caused by the workload's own manifest or records.
 *
 * Validation errors are deterministic given their inputs and are surfaced to
 * the caller verbatim; retrying without changing the manifest cannot help.
 */
export class ValidationError extends Error {
  override name = "ValidationError";
}

export class ManifestError extends ValidationError {
  override name = "ManifestError";

  constructor(
    public readonly file: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ${file}: ${message}`, options);
  }
}

export class NoDomainAssociatedError extends ValidationError {
  override name = "NoDomainAssociatedError";

  constructor(
    public readonly field: string,
    application: string,
  ) {
    super(
      `cannot specify ${field} when application ${application} is not ` +
        "associated with a domain",
    );
  }
}

export class IncompatibleAppVersionError extends ValidationError {
  override name = "IncompatibleAppVersionError";

  constructor(public readonly minimumVersion: string) {
    super(
      `alias is not compatible with application versions below ${minimumVersion}`,
    );
  }
}

export type AliasScope = "root" | "environment-level" | "application-level";

export class UnsupportedAliasScopeError extends ValidationError {
  override name = "UnsupportedAliasScopeError";

  constructor(
    public readonly alias: string,
    public readonly scope: AliasScope,
  ) {
    super(
      scope === "root"
        ? `${alias} is a root domain alias, which is not supported yet`
        : `${alias} is an ${scope} alias, which is not supported yet`,
    );
  }
}

export class UnsupportedHostedZoneError extends ValidationError {
  override name = "UnsupportedHostedZoneError";

  constructor(
    public readonly alias: string,
    domain: string,
  ) {
    super(
      `alias "${alias}" is not supported in hosted zones other than ` +
        `<subdomain>.${domain}`,
    );
  }
}

export class MissingTopicError extends ValidationError {
  override name = "MissingTopicError";

  constructor(
    public readonly topic: string,
    environment: string,
  ) {
    super(`topic ${topic} does not exist in environment ${environment}`);
  }
}

/**
 * Wraps a failure with one line of context, keeping the original as cause.
 */
abstract class ContextualError extends Error {
  protected constructor(context: string, cause: unknown) {
    super(`${context}: ${describeError(cause)}`, { cause });
  }
}

/**
 * A query against the environment (discovery endpoint, CIDR blocks, topics,
 * certificates, custom resource uploads) failed.
 */
export class EnvironmentQueryError extends ContextualError {
  override name = "EnvironmentQueryError";

  constructor(context: string, cause: unknown) {
    super(context, cause);
  }
}

export class ProvisioningError extends ContextualError {
  override name = "ProvisioningError";

  constructor(context: string, cause: unknown) {
    super(context, cause);
  }
}

/**
 * The provisioning backend computed an empty change set for the stack.
 */
export class ChangeSetEmptyError extends Error {
  override name = "ChangeSetEmptyError";

  constructor(public readonly stackName: string) {
    super(`change set for stack ${stackName} has no changes`);
  }
}

/**
 * The service did not reach a stable state within its polling budget.
 */
export class StabilityTimeoutError extends Error {
  override name = "StabilityTimeoutError";

  constructor(public readonly attempts: number) {
    super(`max retries ${attempts} exceeded`);
  }
}

export class ForceUpdateError extends ContextualError {
  override name = "ForceUpdateError";

  constructor(workload: string, cause: unknown) {
    super(`force an update for service ${workload}`, cause);
  }
}

/**
 * A force update was issued but the service did not stabilise in time. The
 * update itself may still complete; the guidance tells the caller where to
 * look.
 */
export class ForceUpdateTimeoutError extends ContextualError {
  override name = "ForceUpdateTimeoutError";

  constructor(
    workload: string,
    cause: StabilityTimeoutError,
    public readonly guidance: string,
  ) {
    super(`force an update for service ${workload}`, cause);
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
