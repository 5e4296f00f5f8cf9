import * as core from "@actions/core";
import type { DeploymentDependencies } from "./backend.js";
import { deployStack, type DeployResult } from "./deployer.js";
import type { WorkloadManifest } from "./manifest.js";
import type {
  ApplicationRecord,
  ArtifactReferences,
  EnvironmentRecord,
} from "./records.js";
import { stackConfiguration, type StackConfiguration } from "./stack.js";

export interface DeploymentInput {
  manifest: WorkloadManifest;
  environment: EnvironmentRecord;
  application: ApplicationRecord;
  artifacts: ArtifactReferences;
  options: {
    forceNewUpdate: boolean;
    disableRollback: boolean;
    signal?: AbortSignal;
  };
}

export interface Deployment {
  configuration: StackConfiguration;
  result: DeployResult;
}

/**
 * Main deployment function
 *
 * Builds the stack configuration for a workload, renders it and hands it to
 * the deployer. The start time used to decide whether a forced update is
 * still required is captured once, before anything else happens.
 */
export async function deployWorkload(
  {
    manifest,
    environment,
    application,
    artifacts,
    options: { forceNewUpdate, disableRollback, signal },
  }: Readonly<DeploymentInput>,
  dependencies: DeploymentDependencies,
): Promise<Deployment> {
  const startedAt = dependencies.now();

  core.info(
    `Deploying ${manifest.type} "${manifest.name}" to environment ` +
      `${environment.name} of application ${application.name}`,
  );

  const configuration = await stackConfiguration(
    { manifest, environment, application },
    { artifacts, forceNewUpdate, disableRollback },
    dependencies,
  );
  const document = dependencies.renderStackTemplate(configuration);
  const result = await deployStack(configuration, document, dependencies, {
    startedAt,
    signal,
  });

  core.info(result.details);

  return { configuration, result };
}
