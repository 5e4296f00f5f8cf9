import { isAbsolute, join } from "node:path";
import { debug, getBooleanInput, getInput } from "@actions/core";
import type { ArtifactReferences } from "./records.js";

/**
 * Deployment settings
 */
export interface Settings {
  manifestFile: string;
  environmentFile: string;
  applicationFile: string;
  templateFile: string;

  /**
   * Name of the environment to deploy to. If set, it must match the name in
   * the environment file.
   */
  environment?: string;
  artifacts: ArtifactReferences;
  customResources: Map<string, string>;
  forceNewUpdate: boolean;
  disableRollback: boolean;

  /**
   * Seconds between two checks of the service's state after a forced update.
   */
  stabilityInterval: number;

  /**
   * Seconds to wait for the service to stabilise after a forced update.
   */
  stabilityTimeout: number;
}

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

/**
 * Parse settings from GitHub Actions inputs
 */
export function parseSettings(env: NodeJS.ProcessEnv) {
  debug("Parsing settings from inputs");

  const workspace = env.GITHUB_WORKSPACE || ".";

  return defineSettings({
    manifestFile: resolvePath(getInput("manifest") || "manifest.yml", workspace),
    environmentFile: resolvePath(
      getInput("environment-file") || "environment.yml",
      workspace,
    ),
    applicationFile: resolvePath(
      getInput("application-file") || "application.yml",
      workspace,
    ),
    templateFile: resolvePath(
      getInput("template-file") || "stack.template.yml",
      workspace,
    ),
    environment: getInput("environment") || undefined,
    artifacts: {
      bucket: getInput("artifact-bucket", { required: true }),
      image: {
        location: getInput("image") || undefined,
        digest: getInput("image-digest") || undefined,
      },
      addonsUrl: getInput("addons-url") || undefined,
      envFileArn: getInput("env-file-arn") || undefined,
    },
    customResources: parseCustomResources(
      getInput("custom-resources"),
      workspace,
    ),
    forceNewUpdate:
      getBooleanInput("force-new-update", { required: false }) ?? false,
    disableRollback:
      getBooleanInput("disable-rollback", { required: false }) ?? false,
    stabilityInterval: parseSeconds(
      "stability-interval",
      getInput("stability-interval") || "15",
    ),
    stabilityTimeout: parseSeconds(
      "stability-timeout",
      getInput("stability-timeout") || "600",
    ),
  });
}

function resolvePath(path: string, workspace: string) {
  return isAbsolute(path) ? path : join(workspace, path);
}

function parseSeconds(name: string, value: string) {
  const seconds = parseInt(value, 10);

  if (isNaN(seconds) || seconds <= 0) {
    throw new Error(
      `Invalid ${name}: expected a positive number of seconds, got "${value}"`,
    );
  }

  return seconds;
}

/**
 * Parse custom resource scripts given as `name=path` lines
 */
function parseCustomResources(input: string | undefined, workspace: string) {
  const resources = new Map<string, string>();

  for (const line of (input ?? "").split("\n").map((line) => line.trim())) {
    // Skip empty lines and comments
    if (!line || line.startsWith("#")) {
      continue;
    }

    const [name, ...parts] = line.split("=").map((part) => part.trim());
    const path = parts.join("=");

    if (!name || !path) {
      throw new Error(
        `Invalid custom resource "${line}": expected a name=path pair`,
      );
    }

    resources.set(name, resolvePath(path, workspace));
  }

  return resources;
}
