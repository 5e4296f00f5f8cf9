import * as core from "@actions/core";
import { load } from "js-yaml";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ManifestError } from "./errors.js";
import {
  mapping,
  number,
  optional,
  optionalNumber,
  optionalText,
  parseDocument,
  text,
} from "./schema.js";

export const loadBalancedWebService = "Load Balanced Web Service";
export const requestDrivenWebService = "Request-Driven Web Service";
export const workerService = "Worker Service";

export const workloadKinds = [
  loadBalancedWebService,
  requestDrivenWebService,
  workerService,
] as const;

export type WorkloadKind = (typeof workloadKinds)[number];

const alias = optional(
  z.union([z.string(), z.array(z.string())], {
    errorMap: () => ({ message: "must be a hostname or a list of hostnames" }),
  }),
);

const variables = optional(
  z
    .record(z.unknown(), { invalid_type_error: "must be a mapping" })
    .transform((entries) =>
      Object.fromEntries(
        Object.entries(entries).map(([name, value]) => [name, String(value)]),
      ),
    ),
);

const topicSubscription = mapping({
  name: text,
  service: text,
  queue: optional(
    z.union([z.boolean(), z.record(z.unknown())], {
      errorMap: () => ({ message: "must be a boolean or a mapping" }),
    }),
  ),
});

const workloadManifestBase = {
  name: text,
  count: optionalNumber,
  cpu: optionalNumber,
  memory: optionalNumber,
  variables,
};

const image = mapping({ port: number });

const loadBalancedWebServiceManifest = z.object({
  ...workloadManifestBase,
  type: z.literal(loadBalancedWebService),
  image,
  http: mapping({
    path: text,
    alias,
    healthcheck: optionalText,
  }),
  nlb: optional(
    mapping({
      port: optionalText,
      alias,
    }),
  ),
});

const requestDrivenWebServiceManifest = z.object({
  ...workloadManifestBase,
  type: z.literal(requestDrivenWebService),
  image,
  http: optional(mapping({ alias: optionalText })).transform((http) => ({
    alias: http?.alias,
  })),
});

const workerServiceManifest = z.object({
  ...workloadManifestBase,
  type: z.literal(workerService),
  subscribe: optional(
    mapping({
      topics: optional(
        z.array(topicSubscription, { invalid_type_error: "must be a list" }),
      ),
    }),
  ).transform((subscribe) => ({ topics: subscribe?.topics ?? [] })),
});

export const workloadManifest = z.discriminatedUnion(
  "type",
  [
    loadBalancedWebServiceManifest,
    requestDrivenWebServiceManifest,
    workerServiceManifest,
  ],
  {
    errorMap: (issue, context) => {
      if (issue.code === "invalid_union_discriminator") {
        return { message: describeWorkloadType(context.data) };
      }

      if (issue.code === "invalid_type") {
        return { message: "must be a mapping" };
      }

      return { message: context.defaultError };
    },
  },
);

/**
 * One or more hostnames, written either as a single string or as a list.
 */
export type Alias = string | string[];

export type TopicSubscription = z.infer<typeof topicSubscription>;

export type LoadBalancedWebServiceManifest = z.infer<
  typeof loadBalancedWebServiceManifest
>;

export type RequestDrivenWebServiceManifest = z.infer<
  typeof requestDrivenWebServiceManifest
>;

export type WorkerServiceManifest = z.infer<typeof workerServiceManifest>;

export type WorkloadManifest = z.infer<typeof workloadManifest>;

export function defineManifest<T extends WorkloadManifest>(manifest: T) {
  return manifest;
}

/**
 * Normalise an alias into an ordered list of distinct hostnames.
 *
 * Order is kept, as certificates are requested in the same order the aliases
 * are listed in.
 */
export function aliasList(alias: Alias | undefined): string[] {
  if (alias === undefined) {
    return [];
  }

  const entries = typeof alias === "string" ? [alias] : alias;

  return [...new Set(entries.map((entry) => entry.trim()).filter(Boolean))];
}

/**
 * Load and check a workload manifest from a YAML file
 */
export async function loadManifest(filename: string) {
  core.debug(`Loading workload manifest from "${filename}"`);

  return parseManifest(await loadYamlDocument(filename), filename);
}

/**
 * Read and parse a YAML file without interpreting its content
 */
export async function loadYamlDocument(filename: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filename, "utf8");
  } catch (cause) {
    throw new ManifestError(filename, "file cannot be read", { cause });
  }

  try {
    return load(content, { filename });
  } catch (cause) {
    throw new ManifestError(filename, "not valid YAML", { cause });
  }
}

export function parseManifest(document: unknown, file = "manifest") {
  return parseDocument(workloadManifest, document, file);
}

function describeWorkloadType(document: unknown) {
  const type = isRecord(document) ? document.type : undefined;

  if (type === undefined || type === null) {
    return "is required";
  }

  return (
    `must be one of ${workloadKinds.map((kind) => `"${kind}"`).join(", ")}, ` +
    `got "${String(type)}"`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
