import * as core from "@actions/core";
import { exec } from "@actions/exec";
import { randomUUID } from "node:crypto";
import { unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ChangeSetEmptyError } from "./errors.js";
import type {
  CertificateInfo,
  EcsServiceInfo,
  StackInfo,
  StackResourceInfo,
  SubnetInfo,
  TaggedResourceInfo,
} from "./types.js";

/**
 * Capabilities granted to every stack; workload stacks create IAM roles and
 * may include nested add-on stacks.
 */
const stackCapabilities = [
  "CAPABILITY_IAM",
  "CAPABILITY_NAMED_IAM",
  "CAPABILITY_AUTO_EXPAND",
] as const;

/**
 * Failure of an AWS CLI invocation, carrying everything the command printed.
 */
export class CommandError extends Error {
  override name = "CommandError";

  constructor(
    message: string,
    public readonly output: string,
    public readonly errorOutput: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Deploy a stack from a rendered template
 *
 * The template is written to a temporary file and handed to
 * `aws cloudformation deploy`, which creates a change set and executes it.
 * If the change set turns out to be empty, a {@link ChangeSetEmptyError} is
 * thrown instead of the CLI's generic failure.
 */
export async function deployCloudFormationStack(
  stackName: string,
  templateBody: string,
  bucket: string,
  {
    region,
    disableRollback,
    tags,
  }: { region: string; disableRollback: boolean; tags: Record<string, string> },
) {
  const templateFile = join(tmpdir(), `${stackName}.${randomUUID()}.yml`);

  await writeFile(templateFile, templateBody, "utf8");

  try {
    await executeAwsCommand(
      [
        "cloudformation",
        "deploy",
        "--stack-name",
        stackName,
        "--template-file",
        templateFile,
        "--s3-bucket",
        bucket,
        "--capabilities",
        ...stackCapabilities,
        disableRollback ? "--disable-rollback" : "",
        ...(Object.keys(tags).length > 0
          ? [
              "--tags",
              ...Object.entries(tags).map(([key, value]) => `${key}=${value}`),
            ]
          : []),
      ],
      { region },
    );
  } catch (cause) {
    if (cause instanceof CommandError && isEmptyChangeSet(cause)) {
      throw new ChangeSetEmptyError(stackName);
    }

    throw cause;
  } finally {
    await unlink(templateFile).catch((error: unknown) =>
      core.warning(`Failed to remove template file ${templateFile}: ${error}`),
    );
  }

  core.info(`Deployed stack ${stackName}`);
}

/**
 * Check whether a failed deploy command only reports an empty change set
 */
export function isEmptyChangeSet({ output, errorOutput }: CommandError) {
  return /No changes to deploy|didn't contain changes/.test(
    `${output}\n${errorOutput}`,
  );
}

export async function describeStack(stackName: string, region: string) {
  const output = await executeAwsCommand(
    ["cloudformation", "describe-stacks", "--stack-name", stackName],
    { region, silent: true },
  );
  const { Stacks: stacks } = parseJson<{ Stacks?: StackInfo[] }>(
    output,
    `stack ${stackName}`,
  );
  const stack = stacks?.[0];

  if (!stack) {
    throw new Error(`Stack "${stackName}" not found`);
  }

  return stack;
}

/**
 * Retrieve the outputs of a stack as a map of output keys to values
 */
export async function describeStackOutputs(stackName: string, region: string) {
  const stack = await describeStack(stackName, region);
  const outputs: Record<string, string> = {};

  for (const { OutputKey, OutputValue } of stack.Outputs ?? []) {
    outputs[OutputKey] = OutputValue;
  }

  return outputs;
}

export async function describeStackResource(
  stackName: string,
  logicalId: string,
  region: string,
) {
  const output = await executeAwsCommand(
    [
      "cloudformation",
      "describe-stack-resource",
      "--stack-name",
      stackName,
      "--logical-resource-id",
      logicalId,
    ],
    { region, silent: true },
  );

  return parseJson<{ StackResourceDetail: StackResourceInfo }>(
    output,
    `resource ${logicalId} of stack ${stackName}`,
  ).StackResourceDetail;
}

export async function describeService(
  cluster: string,
  service: string,
  region: string,
) {
  core.debug(`Describing service ${service} in cluster ${cluster}`);

  const output = await executeAwsCommand(
    ["ecs", "describe-services", "--cluster", cluster, "--services", service],
    { region, silent: true },
  );
  const { services } = parseJson<{ services?: EcsServiceInfo[] }>(
    output,
    `service ${service}`,
  );
  const info = services?.[0];

  if (!info) {
    throw new Error(`Service "${service}" not found in cluster "${cluster}"`);
  }

  return info;
}

/**
 * Start a new deployment of a service without changing its task definition
 */
export async function forceNewDeployment(
  cluster: string,
  service: string,
  region: string,
) {
  core.info(`Restarting tasks of service ${service}`);

  await executeAwsCommand(
    [
      "ecs",
      "update-service",
      "--cluster",
      cluster,
      "--service",
      service,
      "--force-new-deployment",
    ],
    { region, silent: true },
  );
}

/**
 * List the ARNs of resources of a given type carrying all the given tags
 */
export async function listTaggedResources(
  resourceType: string,
  tags: Record<string, string>,
  region: string,
) {
  const tagFilters = Object.entries(tags).map(
    ([key, value]) => `Key=${key},Values=${value}`,
  );
  const output = await executeAwsCommand(
    [
      "resourcegroupstaggingapi",
      "get-resources",
      "--resource-type-filters",
      resourceType,
      ...(tagFilters.length > 0 ? ["--tag-filters", ...tagFilters] : []),
    ],
    { region, silent: true },
  );
  const { ResourceTagMappingList: resources = [] } = parseJson<{
    ResourceTagMappingList?: TaggedResourceInfo[];
  }>(output, `${resourceType} resources`);

  return resources.map(({ ResourceARN }) => ResourceARN);
}

export async function describeSubnets(subnetIds: string[], region: string) {
  if (subnetIds.length === 0) {
    return [];
  }

  const output = await executeAwsCommand(
    ["ec2", "describe-subnets", "--subnet-ids", ...subnetIds],
    { region, silent: true },
  );

  return (
    parseJson<{ Subnets?: SubnetInfo[] }>(output, "subnets").Subnets ?? []
  );
}

export async function describeCertificate(arn: string, region: string) {
  const output = await executeAwsCommand(
    ["acm", "describe-certificate", "--certificate-arn", arn],
    { region, silent: true },
  );

  return parseJson<{ Certificate: CertificateInfo }>(
    output,
    `certificate ${arn}`,
  ).Certificate;
}

/**
 * Upload a file to a bucket
 *
 * @returns The HTTPS URL of the uploaded object
 */
export async function uploadFile(
  path: string,
  bucket: string,
  key: string,
  region: string,
) {
  core.info(`Uploading ${path} to s3://${bucket}/${key}`);

  await executeAwsCommand(["s3", "cp", path, `s3://${bucket}/${key}`], {
    region,
    silent: true,
  });

  return `https://${bucket}.s3.${region}.amazonaws.com/${key}`;
}

/**
 * Execute an AWS CLI command
 *
 * This function executes an AWS CLI command with the given arguments and
 * options, requesting JSON output. It captures the output from stdout and
 * returns it as a string.
 *
 * @param args      The arguments to pass to the AWS CLI
 * @param [region]  Region to run the command against
 * @param [stdin]   Optional input to pass to the command's stdin
 * @param [silent]  If true, suppresses the output of the command to the action
 *                  log output
 */
export async function executeAwsCommand(
  args: [string, ...string[]],
  {
    region = undefined,
    stdin = undefined,
    silent = false,
  }: {
    region?: string;
    stdin?: Buffer | string;
    silent?: boolean;
  } = {},
) {
  const input = stdin
    ? Buffer.isBuffer(stdin)
      ? stdin
      : Buffer.from(stdin)
    : undefined;
  const flags = ["--output", "json", ...(region ? ["--region", region] : [])];
  let output = "";
  let errorOutput = "";

  core.startGroup(`aws ${args.join(" ")}`);

  try {
    await exec("aws", [...args.filter((arg) => arg !== ""), ...flags], {
      input,
      silent,
      listeners: {
        stdout: (data) => (output += data.toString()),
        stderr: (data) => (errorOutput += data.toString()),
      },
    });

    core.debug(output);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    core.error(`Command failed: ${message}`);
    core.error(output);
    core.error(errorOutput);

    throw new CommandError(
      `Failed to execute AWS CLI command: ${message}`,
      output,
      errorOutput,
      { cause },
    );
  } finally {
    core.endGroup();
  }

  return output;
}

function parseJson<T>(content: string, subject: string): T {
  try {
    return JSON.parse(content) as T;
  } catch (cause) {
    throw new Error(
      `Failed to describe ${subject}: Failed to parse JSON output.`,
      { cause },
    );
  }
}
