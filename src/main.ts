import { randomUUID } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import { env } from "node:process";
import { DefaultArtifactClient } from "@actions/artifact";
import * as core from "@actions/core";
import { createAwsDependencies, environmentStackName } from "./backend.js";
import { deployWorkload, type Deployment } from "./deployment.js";
import { webServiceUri } from "./discovery.js";
import { describeStackOutputs } from "./engine.js";
import {
  ForceUpdateTimeoutError,
  ValidationError,
  describeError,
} from "./errors.js";
import { loadBalancedWebService, loadManifest } from "./manifest.js";
import { loadApplication, loadEnvironment } from "./records.js";
import { parseSettings, type Settings } from "./settings.js";
import type { StackConfiguration } from "./stack.js";

export async function run() {
  const controller = new AbortController();
  const abort = () => controller.abort(new Error("Deployment was cancelled"));
  let deployment: Deployment | undefined;

  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);

  try {
    const settings = parseSettings(env);

    deployment = await deploy(settings, controller.signal);

    core.setOutput("stack-name", deployment.result.stackName);
    core.setOutput("outcome", deployment.result.outcome);
    core.setOutput("status", "success");
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error);
    } else {
      core.setFailed(`An unknown error occurred: ${error}`);
    }

    core.setOutput(
      "status",
      error instanceof ForceUpdateTimeoutError ? "timeout" : "failure",
    );
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
  }

  if (!deployment) {
    return;
  }

  try {
    await publishServiceUrl(deployment.configuration);
  } catch (cause) {
    core.warning(
      new Error(`Failed to resolve the service URL: ${describeError(cause)}`, {
        cause,
      }),
    );
  }

  try {
    await storeConfigurationArtifact(deployment.configuration);
  } catch (cause) {
    core.warning(
      new Error(
        `Failed to store stack configuration artifact: ${describeError(cause)}`,
        { cause },
      ),
    );
  }
}

async function deploy(settings: Settings, signal: AbortSignal) {
  const [manifest, environment, application, template] = await Promise.all([
    loadManifest(settings.manifestFile),
    loadEnvironment(settings.environmentFile),
    loadApplication(settings.applicationFile),
    readTemplate(settings.templateFile),
  ]);

  if (settings.environment && settings.environment !== environment.name) {
    throw new ValidationError(
      `environment file describes environment ${environment.name}, ` +
        `not ${settings.environment}`,
    );
  }

  if (environment.application !== application.name) {
    throw new ValidationError(
      `environment ${environment.name} belongs to application ` +
        `${environment.application}, not ${application.name}`,
    );
  }

  const dependencies = createAwsDependencies({
    region: environment.region,
    template,
    customResources: settings.customResources,
    stabilityInterval: settings.stabilityInterval,
    stabilityTimeout: settings.stabilityTimeout,
  });

  return deployWorkload(
    {
      manifest,
      environment,
      application,
      artifacts: settings.artifacts,
      options: {
        forceNewUpdate: settings.forceNewUpdate,
        disableRollback: settings.disableRollback,
        signal,
      },
    },
    dependencies,
  );
}

async function readTemplate(path: string) {
  try {
    return await readFile(path, "utf8");
  } catch (cause) {
    throw new Error(
      `Failed to read stack template ${path}: ${describeError(cause)}`,
      { cause },
    );
  }
}

async function publishServiceUrl(configuration: StackConfiguration) {
  if (configuration.kind !== loadBalancedWebService) {
    return;
  }

  const outputs = await describeStackOutputs(
    environmentStackName(configuration.application, configuration.environment),
    configuration.region,
  );
  const url = webServiceUri(
    outputs,
    configuration.workload,
    configuration.http.path,
  );

  core.info(`Service ${configuration.workload} is available at ${url}`);
  core.setOutput("service-url", url);
}

async function storeConfigurationArtifact(configuration: StackConfiguration) {
  const artifactClient = new DefaultArtifactClient();
  const path = `./stack-configuration.generated.${randomUUID()}.json`;

  try {
    await writeFile(path, JSON.stringify(configuration, null, 2));
  } catch (cause) {
    throw new Error(
      `Failed to write stack configuration to file: ${describeError(cause)}`,
      { cause },
    );
  }

  try {
    await artifactClient.uploadArtifact("stack-configuration", [path], ".", {
      retentionDays: 30,
    });
  } catch (cause) {
    throw new Error(
      `Failed to upload stack configuration artifact: ${describeError(cause)}`,
      { cause },
    );
  }
}
