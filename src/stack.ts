import * as core from "@actions/core";
import {
  validateAlias,
  validateAliases,
  validateNlbAliases,
  type AliasContext,
} from "./alias.js";
import { resolveDiscovery } from "./discovery.js";
import { EnvironmentQueryError, ValidationError } from "./errors.js";
import {
  aliasList,
  loadBalancedWebService,
  requestDrivenWebService,
  workerService,
  type LoadBalancedWebServiceManifest,
  type RequestDrivenWebServiceManifest,
  type WorkerServiceManifest,
  type WorkloadKind,
  type WorkloadManifest,
} from "./manifest.js";
import {
  importsCertificates,
  type ApplicationRecord,
  type ArtifactReferences,
  type EnvironmentRecord,
} from "./records.js";
import { resolveSubscriptions, type ResolvedSubscription } from "./topics.js";

export const applicationTag = "workload-deployer:application";
export const environmentTag = "workload-deployer:environment";
export const serviceTag = "workload-deployer:service";

/**
 * Environment queries and uploads the configuration builders depend on.
 */
export interface StackDependencies {
  serviceDiscoveryEndpoint(environment: EnvironmentRecord): Promise<string>;
  validateCertAliases(aliases: string[], certArns: string[]): Promise<void>;
  publicCidrBlocks(environment: EnvironmentRecord): Promise<string[]>;
  listDeployedTopics(app: string, env: string): Promise<string[]>;
  uploadCustomResources(
    workload: string,
    bucket: string,
  ): Promise<Record<string, string>>;
}

export interface Workload<M extends WorkloadManifest = WorkloadManifest> {
  manifest: M;
  application: ApplicationRecord;
  environment: EnvironmentRecord;
}

/**
 * Artifact references and deployment flags resolved before the stack is
 * built.
 */
export interface StackRuntimeConfiguration {
  artifacts: ArtifactReferences;
  forceNewUpdate: boolean;
  disableRollback: boolean;
}

export interface BaseStackConfiguration {
  kind: WorkloadKind;
  stackName: string;
  workload: string;
  application: string;
  environment: string;
  region: string;
  bucket: string;
  image: {
    location?: string;
    digest?: string;
  };
  addonsUrl?: string;
  envFileArn?: string;
  serviceDiscovery: {
    endpoint: string;
    record?: string;
  };
  count?: number;
  cpu?: number;
  memory?: number;
  variables: Record<string, string>;
  forceUpdate: boolean;
  disableRollback: boolean;
  tags: Record<string, string>;
}

export interface LoadBalancedWebServiceStackConfiguration
  extends BaseStackConfiguration {
  kind: typeof loadBalancedWebService;
  http: {
    path: string;
    port: number;
    healthcheck?: string;
    aliases: string[];
  };
  certificates: string[];
  nlb?: {
    port: string;
    aliases: string[];
    publicCidrBlocks: string[];
  };
}

export interface RequestDrivenWebServiceStackConfiguration
  extends BaseStackConfiguration {
  kind: typeof requestDrivenWebService;
  http: {
    port: number;
    alias?: string;
  };
  customResources: Record<string, string>;
}

export interface WorkerServiceStackConfiguration
  extends BaseStackConfiguration {
  kind: typeof workerService;
  subscriptions: ResolvedSubscription[];
}

export type StackConfiguration =
  | LoadBalancedWebServiceStackConfiguration
  | RequestDrivenWebServiceStackConfiguration
  | WorkerServiceStackConfiguration;

/**
 * Build the name of the stack that holds a workload's resources
 */
export function workloadStackName(app: string, env: string, workload: string) {
  return `${app}-${env}-${workload}`;
}

/**
 * Build the stack configuration for a workload
 *
 * Each workload kind resolves its own network and messaging sections on top
 * of the shared base. No partial configuration is ever returned: the first
 * failing step aborts the build.
 */
export async function stackConfiguration(
  workload: Workload,
  runtime: StackRuntimeConfiguration,
  dependencies: StackDependencies,
): Promise<StackConfiguration> {
  const { manifest } = workload;

  core.debug(
    `Building stack configuration for ${manifest.type} "${manifest.name}"`,
  );

  switch (manifest.type) {
    case loadBalancedWebService:
      return loadBalancedWebServiceConfiguration(
        { ...workload, manifest },
        runtime,
        dependencies,
      );

    case requestDrivenWebService:
      return requestDrivenWebServiceConfiguration(
        { ...workload, manifest },
        runtime,
        dependencies,
      );

    case workerService:
      return workerServiceConfiguration(
        { ...workload, manifest },
        runtime,
        dependencies,
      );
  }
}

export async function loadBalancedWebServiceConfiguration(
  workload: Workload<LoadBalancedWebServiceManifest>,
  runtime: StackRuntimeConfiguration,
  dependencies: StackDependencies,
): Promise<LoadBalancedWebServiceStackConfiguration> {
  const { manifest, environment } = workload;
  const endpoint = await discoveryEndpoint(environment, dependencies);
  const certificates = environment.importCertArns;
  const declaresAlias = aliasList(manifest.http.alias).length > 0;

  if (importsCertificates(environment) && !declaresAlias) {
    throw new ValidationError(
      `cannot deploy service ${manifest.name} without http.alias to ` +
        `environment ${environment.name} with certificate imported`,
    );
  }

  const aliases = validateAliases(
    manifest.http.alias,
    aliasContext(workload, "http.alias"),
  );

  if (importsCertificates(environment)) {
    await validateCertificateAliases(aliases, environment, dependencies);
  }

  const nlbAliases = validateNlbAliases(
    manifest.nlb?.alias,
    aliasContext(workload, "nlb.alias"),
  );
  let nlb: LoadBalancedWebServiceStackConfiguration["nlb"];

  if (manifest.nlb?.port) {
    nlb = {
      port: manifest.nlb.port,
      aliases: nlbAliases,
      publicCidrBlocks: await publicCidrBlocks(environment, dependencies),
    };
  }

  return {
    ...baseConfiguration(workload, runtime, endpoint, manifest.image.port),
    kind: manifest.type,
    http: {
      path: manifest.http.path,
      port: manifest.image.port,
      healthcheck: manifest.http.healthcheck,
      aliases,
    },
    certificates,
    nlb,
  };
}

export async function requestDrivenWebServiceConfiguration(
  workload: Workload<RequestDrivenWebServiceManifest>,
  runtime: StackRuntimeConfiguration,
  dependencies: StackDependencies,
): Promise<RequestDrivenWebServiceStackConfiguration> {
  const { manifest } = workload;
  const endpoint = await discoveryEndpoint(workload.environment, dependencies);
  const [declaredAlias] = aliasList(manifest.http.alias);
  const alias = declaredAlias
    ? validateAlias(declaredAlias, aliasContext(workload, "http.alias"))
    : undefined;
  const { bucket } = runtime.artifacts;
  let customResources: Record<string, string>;

  try {
    customResources = await dependencies.uploadCustomResources(
      manifest.name,
      bucket,
    );
  } catch (cause) {
    throw new EnvironmentQueryError(
      `upload custom resources for ${manifest.name} to bucket ${bucket}`,
      cause,
    );
  }

  return {
    ...baseConfiguration(workload, runtime, endpoint, manifest.image.port),
    kind: manifest.type,
    http: {
      port: manifest.image.port,
      alias,
    },
    customResources,
  };
}

export async function workerServiceConfiguration(
  workload: Workload<WorkerServiceManifest>,
  runtime: StackRuntimeConfiguration,
  dependencies: StackDependencies,
): Promise<WorkerServiceStackConfiguration> {
  const { manifest, application, environment } = workload;
  const endpoint = await discoveryEndpoint(environment, dependencies);
  let topicArns: string[];

  try {
    topicArns = await dependencies.listDeployedTopics(
      application.name,
      environment.name,
    );
  } catch (cause) {
    throw new EnvironmentQueryError(
      `list deployed topics for application ${application.name} and ` +
        `environment ${environment.name}`,
      cause,
    );
  }

  return {
    ...baseConfiguration(workload, runtime, endpoint),
    kind: manifest.type,
    subscriptions: resolveSubscriptions(
      manifest.subscribe.topics,
      topicArns,
      application.name,
      environment.name,
    ),
  };
}

function baseConfiguration(
  { manifest, application, environment }: Workload,
  { artifacts, forceNewUpdate, disableRollback }: StackRuntimeConfiguration,
  endpoint: string,
  port?: number,
) {
  return {
    stackName: workloadStackName(
      application.name,
      environment.name,
      manifest.name,
    ),
    workload: manifest.name,
    application: application.name,
    environment: environment.name,
    region: environment.region,
    bucket: artifacts.bucket,
    image: { ...artifacts.image },
    addonsUrl: artifacts.addonsUrl,
    envFileArn: artifacts.envFileArn,
    serviceDiscovery: {
      endpoint,
      record:
        port === undefined
          ? undefined
          : resolveDiscovery(manifest.name, application.name, port),
    },
    count: manifest.count,
    cpu: manifest.cpu,
    memory: manifest.memory,
    variables: { ...manifest.variables },
    forceUpdate: forceNewUpdate,
    disableRollback,
    tags: {
      [applicationTag]: application.name,
      [environmentTag]: environment.name,
      [serviceTag]: manifest.name,
    },
  } satisfies Omit<BaseStackConfiguration, "kind">;
}

function aliasContext(
  { application, environment }: Workload,
  field: string,
): AliasContext & { environment: EnvironmentRecord } {
  return { application, environment, field };
}

async function discoveryEndpoint(
  environment: EnvironmentRecord,
  dependencies: StackDependencies,
) {
  try {
    return await dependencies.serviceDiscoveryEndpoint(environment);
  } catch (cause) {
    throw new EnvironmentQueryError(
      `get service discovery endpoint for environment ${environment.name}`,
      cause,
    );
  }
}

async function validateCertificateAliases(
  aliases: string[],
  environment: EnvironmentRecord,
  dependencies: StackDependencies,
) {
  try {
    await dependencies.validateCertAliases(aliases, environment.importCertArns);
  } catch (cause) {
    const context =
      "validate aliases against the imported certificate for env " +
      environment.name;

    if (cause instanceof ValidationError) {
      throw new ValidationError(`${context}: ${cause.message}`, { cause });
    }

    throw new EnvironmentQueryError(context, cause);
  }
}

async function publicCidrBlocks(
  environment: EnvironmentRecord,
  dependencies: StackDependencies,
) {
  try {
    return await dependencies.publicCidrBlocks(environment);
  } catch (cause) {
    throw new EnvironmentQueryError(
      "get public CIDR blocks information from the VPC of environment " +
        environment.name,
      cause,
    );
  }
}
