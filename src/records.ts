import * as core from "@actions/core";
import { z } from "zod";
import { loadYamlDocument } from "./manifest.js";
import {
  mapping,
  optional,
  optionalText,
  parseDocument,
  text,
} from "./schema.js";

/**
 * Template version assumed for applications that predate versioning.
 */
export const legacyTemplateVersion = "v0.0.0";

const applicationRecord = mapping({
  name: text,

  /**
   * Domain the application is associated with; empty if there is none.
   */
  domain: optionalText.transform((domain) => domain ?? ""),

  /**
   * Version of the application's infrastructure template.
   */
  version: optionalText.transform(
    (version) => version || legacyTemplateVersion,
  ),
});

const environmentRecord = mapping({
  name: text,
  application: text,
  region: text,

  /**
   * Certificates imported into the environment. When present, the
   * environment does not use the application's managed hosted zone.
   */
  importCertArns: optional(
    z.array(z.string({ invalid_type_error: "must be a string" }), {
      invalid_type_error: "must be a list of strings",
    }),
  ).transform((arns) => arns ?? []),
});

export type ApplicationRecord = z.infer<typeof applicationRecord>;

export type EnvironmentRecord = z.infer<typeof environmentRecord>;

/**
 * Uploaded build artifacts the stack refers to.
 */
export interface ArtifactReferences {
  bucket: string;
  image?: {
    location?: string;
    digest?: string;
  };
  addonsUrl?: string;
  envFileArn?: string;
}

export function defineApplication<T extends ApplicationRecord>(record: T) {
  return record;
}

export function defineEnvironment<T extends EnvironmentRecord>(record: T) {
  return record;
}

export function importsCertificates(environment: EnvironmentRecord) {
  return environment.importCertArns.length > 0;
}

export async function loadApplication(filename: string) {
  core.debug(`Loading application record from "${filename}"`);

  return parseApplication(await loadYamlDocument(filename), filename);
}

export async function loadEnvironment(filename: string) {
  core.debug(`Loading environment record from "${filename}"`);

  return parseEnvironment(await loadYamlDocument(filename), filename);
}

export function parseApplication(document: unknown, file = "application") {
  return parseDocument(applicationRecord, document, file);
}

export function parseEnvironment(document: unknown, file = "environment") {
  return parseDocument(environmentRecord, document, file);
}
