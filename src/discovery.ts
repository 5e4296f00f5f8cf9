/**
 * Environments sharing the same service discovery namespace.
 */
export interface ServiceDiscoveryGroup {
  environments: string[];
  namespace: string;
}

/**
 * Outputs of an environment stack relevant to routing.
 */
export interface EnvironmentOutputs {
  PublicLoadBalancerDNSName?: string;
  EnvironmentSubdomain?: string;
  ServiceDiscoveryEndpoint?: string;
  [key: string]: string | undefined;
}

/**
 * Build the private discovery name of a service
 */
export function resolveDiscovery(
  service: string,
  app: string,
  port: number | string,
) {
  return `${service}.${app}.local:${port}`;
}

/**
 * Add an environment to the group of its discovery namespace, creating the
 * group if no environment shares the namespace yet.
 */
export function appendServiceDiscovery(
  groups: readonly ServiceDiscoveryGroup[],
  namespace: string,
  environment: string,
): ServiceDiscoveryGroup[] {
  if (!groups.some((group) => group.namespace === namespace)) {
    return [...groups, { environments: [environment], namespace }];
  }

  return groups.map((group) =>
    group.namespace === namespace
      ? { ...group, environments: [...group.environments, environment] }
      : group,
  );
}

/**
 * Group the discovery names of a service across all environments it is
 * deployed to
 */
export function groupServiceDiscoveries(
  service: string,
  app: string,
  ports: ReadonlyMap<string, number | string>,
) {
  let groups: ServiceDiscoveryGroup[] = [];

  for (const [environment, port] of ports) {
    groups = appendServiceDiscovery(
      groups,
      resolveDiscovery(service, app, port),
      environment,
    );
  }

  return groups;
}

/**
 * Build the public URL of a load-balanced web service
 *
 * Services in environments with a subdomain are served over HTTPS on
 * `<service>.<subdomain>`; all others are reached through the load balancer's
 * DNS name and the service's path.
 */
export function webServiceUri(
  outputs: EnvironmentOutputs,
  service: string,
  path: string,
) {
  if (outputs.EnvironmentSubdomain) {
    return `https://${service}.${outputs.EnvironmentSubdomain}`;
  }

  const dnsName = outputs.PublicLoadBalancerDNSName ?? "";

  if (path === "/" || path === "") {
    return `http://${dnsName}`;
  }

  return `http://${dnsName}/${path.replace(/^\/+/, "")}`;
}
