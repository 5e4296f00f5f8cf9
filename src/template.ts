import { loadBalancedWebService, requestDrivenWebService } from "./manifest.js";
import type { StackConfiguration } from "./stack.js";
import { interpolateString } from "./utils.js";

/**
 * Render a stack template for a configuration
 *
 * References to the configuration's template variables are substituted in a
 * single pass; everything else in the template is passed through unchanged.
 * Rendering is deterministic: the same configuration and template always
 * produce the same document.
 *
 * @param configuration Resolved stack configuration
 * @param template      Template source, usually read from the template file
 */
export function renderStackTemplate(
  configuration: StackConfiguration,
  template: string,
) {
  return interpolateString(template, templateVariables(configuration));
}

/**
 * Derive the variables available to stack templates from a configuration.
 *
 * Optional settings that are absent resolve to an empty string, so templates
 * can guard them with `${NAME:-default}` or `${NAME:+value}`. Lists are
 * joined with commas; structured values are serialised as JSON.
 */
export function templateVariables(configuration: StackConfiguration) {
  const variables = new Map<string, string>([
    ["STACK_NAME", configuration.stackName],
    ["WORKLOAD_NAME", configuration.workload],
    ["WORKLOAD_TYPE", configuration.kind],
    ["APP_NAME", configuration.application],
    ["ENV_NAME", configuration.environment],
    ["REGION", configuration.region],
    ["ARTIFACT_BUCKET", configuration.bucket],
    ["IMAGE_LOCATION", configuration.image.location ?? ""],
    ["IMAGE_DIGEST", configuration.image.digest ?? ""],
    ["ADDONS_URL", configuration.addonsUrl ?? ""],
    ["ENV_FILE_ARN", configuration.envFileArn ?? ""],
    ["DISCOVERY_ENDPOINT", configuration.serviceDiscovery.endpoint],
    ["DISCOVERY_RECORD", configuration.serviceDiscovery.record ?? ""],
    ["DESIRED_COUNT", optional(configuration.count)],
    ["CPU", optional(configuration.cpu)],
    ["MEMORY", optional(configuration.memory)],
    ["FORCE_UPDATE", String(configuration.forceUpdate)],
    ["DISABLE_ROLLBACK", String(configuration.disableRollback)],
    ["VARIABLES", JSON.stringify(configuration.variables)],
    ["STACK_CONFIGURATION", JSON.stringify(configuration)],
  ]);

  switch (configuration.kind) {
    case loadBalancedWebService:
      variables.set("HTTP_PATH", configuration.http.path);
      variables.set("HTTP_PORT", String(configuration.http.port));
      variables.set("HEALTHCHECK_PATH", configuration.http.healthcheck ?? "");
      variables.set("ALIASES", configuration.http.aliases.join(","));
      variables.set("CERTIFICATE_ARNS", configuration.certificates.join(","));
      variables.set("NLB_PORT", configuration.nlb?.port ?? "");
      variables.set("NLB_ALIASES", configuration.nlb?.aliases.join(",") ?? "");
      variables.set(
        "PUBLIC_CIDR_BLOCKS",
        configuration.nlb?.publicCidrBlocks.join(",") ?? "",
      );
      break;

    case requestDrivenWebService:
      variables.set("HTTP_PORT", String(configuration.http.port));
      variables.set("ALIAS", configuration.http.alias ?? "");
      variables.set(
        "CUSTOM_RESOURCES",
        JSON.stringify(configuration.customResources),
      );
      break;

    default:
      variables.set(
        "TOPIC_ARNS",
        configuration.subscriptions.map(({ topicArn }) => topicArn).join(","),
      );
      variables.set(
        "SUBSCRIPTIONS",
        JSON.stringify(configuration.subscriptions),
      );
  }

  return variables;
}

function optional(value: number | undefined) {
  return value === undefined ? "" : String(value);
}
