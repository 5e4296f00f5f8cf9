import * as core from "@actions/core";
import { ValidationError } from "./errors.js";
import type { CertificateInfo } from "./types.js";

/**
 * Check whether a hostname is covered by any of a certificate's names.
 *
 * Names are compared case-insensitively. A wildcard name (`*.example.com`)
 * covers exactly one additional label, so it matches `api.example.com` but
 * neither `example.com` nor `v1.api.example.com`.
 */
export function isCoveredBy(alias: string, names: readonly string[]) {
  const hostname = alias.toLowerCase();

  return names.some((name) => {
    const pattern = name.toLowerCase();

    if (!pattern.startsWith("*.")) {
      return pattern === hostname;
    }

    const suffix = pattern.slice(1);
    const label = hostname.slice(0, -suffix.length);

    return (
      hostname.endsWith(suffix) && label.length > 0 && !label.includes(".")
    );
  });
}

export function certificateNames({
  DomainName,
  SubjectAlternativeNames = [],
}: CertificateInfo) {
  return [...new Set([DomainName, ...SubjectAlternativeNames])];
}

/**
 * Verify that every alias is covered by at least one imported certificate
 *
 * @param aliases  Hostnames the service answers on
 * @param certArns ARNs of the certificates imported into the environment
 * @param describe Retrieves the details of a single certificate
 * @throws {ValidationError} If an alias is not covered by any certificate
 */
export async function validateCertAliases(
  aliases: readonly string[],
  certArns: readonly string[],
  describe: (arn: string) => Promise<CertificateInfo>,
) {
  const names: string[] = [];

  for (const arn of certArns) {
    const certificate = await describe(arn);

    core.debug(
      `Certificate ${arn} covers ${certificateNames(certificate).join(", ")}`,
    );
    names.push(...certificateNames(certificate));
  }

  for (const alias of aliases) {
    if (!isCoveredBy(alias, names)) {
      throw new ValidationError(
        `${alias} is not a valid domain against ${certArns.join(",")}`,
      );
    }
  }
}
