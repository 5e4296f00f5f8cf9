import * as core from "@actions/core";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { validateCertAliases } from "./certificates.js";
import type { DeployerDependencies } from "./deployer.js";
import type { EnvironmentOutputs } from "./discovery.js";
import {
  deployCloudFormationStack,
  describeCertificate,
  describeService,
  describeStackOutputs,
  describeStackResource,
  describeSubnets,
  forceNewDeployment,
  listTaggedResources,
  uploadFile,
} from "./engine.js";
import { lastDeploymentTime, waitForServiceStability } from "./monitoring.js";
import type { EnvironmentRecord } from "./records.js";
import {
  applicationTag,
  environmentTag,
  workloadStackName,
  type StackConfiguration,
  type StackDependencies,
} from "./stack.js";
import { renderStackTemplate } from "./template.js";
import { sha256 } from "./utils.js";

/**
 * Everything a deployment needs from the outside world.
 */
export interface DeploymentDependencies
  extends StackDependencies,
    DeployerDependencies {
  /**
   * Current time; the deployment start is read from here exactly once.
   */
  now(): Date;

  renderStackTemplate(configuration: StackConfiguration): string;
}

export interface AwsBackendOptions {
  region: string;

  /**
   * Template the stack documents are rendered from.
   */
  template: string;

  /**
   * Custom resource scripts to upload, by resource name.
   */
  customResources: ReadonlyMap<string, string>;
  stabilityInterval: number;
  stabilityTimeout: number;
}

/**
 * Name of the stack holding an environment's shared resources.
 */
export function environmentStackName(app: string, env: string) {
  return `${app}-${env}`;
}

/**
 * Logical ID of the service resource in workload stacks.
 */
export const serviceResource = "Service";

/**
 * Create the deployment dependencies backed by the AWS CLI
 */
export function createAwsDependencies({
  region,
  template,
  customResources,
  stabilityInterval,
  stabilityTimeout,
}: AwsBackendOptions): DeploymentDependencies {
  async function environmentOutputs(
    environment: Pick<EnvironmentRecord, "application" | "name">,
  ): Promise<EnvironmentOutputs> {
    return describeStackOutputs(
      environmentStackName(environment.application, environment.name),
      region,
    );
  }

  async function service(app: string, env: string, workload: string) {
    const { ClusterId: cluster } = await environmentOutputs({
      application: app,
      name: env,
    });

    if (!cluster) {
      throw new Error(
        `Environment ${env} of application ${app} does not export a cluster`,
      );
    }

    const { PhysicalResourceId: serviceArn } = await describeStackResource(
      workloadStackName(app, env, workload),
      serviceResource,
      region,
    );

    return { cluster, serviceArn };
  }

  return {
    now: () => new Date(),

    renderStackTemplate: (configuration) =>
      renderStackTemplate(configuration, template),

    async serviceDiscoveryEndpoint(environment) {
      const outputs = await environmentOutputs(environment);

      return (
        outputs.ServiceDiscoveryEndpoint ?? `${environment.application}.local`
      );
    },

    async validateCertAliases(aliases, certArns) {
      await validateCertAliases(aliases, certArns, (arn) =>
        describeCertificate(arn, region),
      );
    },

    async publicCidrBlocks(environment) {
      const { PublicSubnets: subnets = "" } =
        await environmentOutputs(environment);
      const subnetIds = subnets
        .split(",")
        .map((id) => id.trim())
        .filter(Boolean);

      return (await describeSubnets(subnetIds, region)).map(
        ({ CidrBlock }) => CidrBlock,
      );
    },

    async listDeployedTopics(app, env) {
      return listTaggedResources(
        "sns:topic",
        { [applicationTag]: app, [environmentTag]: env },
        region,
      );
    },

    async uploadCustomResources(workload, bucket) {
      const urls: Record<string, string> = {};

      for (const [name, path] of customResources) {
        const content = await readFile(path);
        const key =
          `manual/scripts/custom-resources/${workload.toLowerCase()}/` +
          `${sha256(content)}/${basename(path)}`;

        urls[name] = await uploadFile(path, bucket, key, region);
      }

      return urls;
    },

    async submitStack(stackName, document, bucket, options) {
      await deployCloudFormationStack(stackName, document, bucket, {
        region,
        ...options,
      });
    },

    async lastUpdatedAt(app, env, workload) {
      const { cluster, serviceArn } = await service(app, env, workload);

      return lastDeploymentTime(
        await describeService(cluster, serviceArn, region),
      );
    },

    async forceUpdate(app, env, workload, signal) {
      const { cluster, serviceArn } = await service(app, env, workload);

      await forceNewDeployment(cluster, serviceArn, region);
      core.info(`Waiting for service ${workload} to stabilise`);

      await waitForServiceStability(
        () => describeService(cluster, serviceArn, region),
        {
          interval: stabilityInterval,
          timeout: stabilityTimeout,
          signal,
        },
      );
    },
  };
}
