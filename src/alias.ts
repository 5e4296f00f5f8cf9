import * as core from "@actions/core";
import { lt, valid } from "semver";
import {
  IncompatibleAppVersionError,
  NoDomainAssociatedError,
  UnsupportedAliasScopeError,
  UnsupportedHostedZoneError,
  ValidationError,
} from "./errors.js";
import { type Alias, aliasList } from "./manifest.js";
import type { ApplicationRecord, EnvironmentRecord } from "./records.js";

/**
 * Earliest application template version that supports aliases.
 */
export const aliasLeastAppTemplateVersion = "v1.0.0";

export interface AliasContext {
  application: Pick<ApplicationRecord, "name" | "domain" | "version">;
  environment: Pick<EnvironmentRecord, "name"> &
    Partial<Pick<EnvironmentRecord, "importCertArns">>;

  /**
   * Manifest field the alias was declared in, used in error messages.
   */
  field: string;
}

/**
 * Validate a single alias against the application's domain hierarchy
 *
 * Aliases must have the shape `<subdomain>.<domain>`. Aliases on the root
 * domain, on the application subdomain (`[<label>.]<app>.<domain>`) or on an
 * environment subdomain (`[<label>.]<env>.<app>.<domain>`, or `<env>.<domain>`)
 * are recognised, but not supported. Anything outside the application's
 * domain is rejected.
 *
 * @returns The alias, once validated
 */
export function validateAlias(alias: string, context: AliasContext) {
  const { application, environment } = context;
  const domain = assertAliasSupport(context);

  if (alias !== domain && !alias.endsWith(`.${domain}`)) {
    throw new UnsupportedHostedZoneError(alias, domain);
  }

  if (alias === domain) {
    throw new UnsupportedAliasScopeError(alias, "root");
  }

  const environmentZone = `${environment.name}.${application.name}.${domain}`;

  if (
    isWithinZone(alias, environmentZone) ||
    alias === `${environment.name}.${domain}`
  ) {
    throw new UnsupportedAliasScopeError(alias, "environment-level");
  }

  if (isWithinZone(alias, `${application.name}.${domain}`)) {
    throw new UnsupportedAliasScopeError(alias, "application-level");
  }

  const subdomain = alias.slice(0, -(domain.length + 1));

  if (subdomain === "" || subdomain.includes(".")) {
    throw new UnsupportedHostedZoneError(alias, domain);
  }

  core.debug(`Alias "${alias}" is a valid service-level alias`);

  return alias;
}

/**
 * Validate every entry of an alias declaration
 *
 * Environments that import certificates do not use the application's hosted
 * zone, so their aliases may name any domain; whether the certificates cover
 * them is checked separately.
 *
 * @returns The distinct aliases, in declaration order
 */
export function validateAliases(
  alias: Alias | undefined,
  context: AliasContext,
) {
  const aliases = aliasList(alias);

  if (aliases.length > 0 && context.environment.importCertArns?.length) {
    assertAliasSupport(context);

    return aliases;
  }

  return aliases.map((entry) => validateAlias(entry, context));
}

/**
 * Ensure the application can have aliases at all
 *
 * @returns The application's domain
 */
function assertAliasSupport({ application, field }: AliasContext) {
  if (!application.domain) {
    throw new NoDomainAssociatedError(field, application.name);
  }

  if (!isAliasCompatibleVersion(application.version)) {
    throw new IncompatibleAppVersionError(aliasLeastAppTemplateVersion);
  }

  return application.domain;
}

/**
 * Validate the aliases of a network load balancer
 *
 * Imported certificates cannot be attached to a network load balancer, so any
 * NLB alias is rejected in environments that import certificates, whatever
 * its shape.
 */
export function validateNlbAliases(
  alias: Alias | undefined,
  context: AliasContext & {
    environment: Pick<EnvironmentRecord, "name" | "importCertArns">;
  },
) {
  const aliases = aliasList(alias);

  if (aliases.length > 0 && context.environment.importCertArns.length > 0) {
    throw new ValidationError(
      `cannot specify ${context.field} when env ${context.environment.name} ` +
        "imports one or more certificates",
    );
  }

  return aliases.map((entry) => validateAlias(entry, context));
}

/**
 * Check whether an application template version supports aliases. Versions
 * that cannot be parsed are treated as legacy versions.
 */
export function isAliasCompatibleVersion(version: string) {
  if (!valid(version)) {
    return false;
  }

  return !lt(version, aliasLeastAppTemplateVersion);
}

/**
 * Whether a hostname is the zone itself, or exactly one label below it.
 */
function isWithinZone(hostname: string, zone: string) {
  if (hostname === zone) {
    return true;
  }

  if (!hostname.endsWith(`.${zone}`)) {
    return false;
  }

  const label = hostname.slice(0, -(zone.length + 1));

  return label !== "" && !label.includes(".");
}
