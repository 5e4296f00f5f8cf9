import * as core from "@actions/core";
import { MissingTopicError } from "./errors.js";
import type { TopicSubscription } from "./manifest.js";

/**
 * A topic deployed by a workload, identified by its resource name
 * `<app>-<env>-<service>-<topic>`.
 */
export interface Topic {
  arn: string;
  application: string;
  environment: string;

  /**
   * Resource name without the application and environment prefix, i.e.
   * `<service>-<topic>`.
   */
  name: string;

  /**
   * Full resource name, as it appears at the end of the ARN.
   */
  resource: string;
}

export type ParsedTopicArn =
  | { kind: "topic"; topic: Topic }
  | { kind: "not-a-topic"; arn: string; reason: string };

export interface ResolvedSubscription extends TopicSubscription {
  topicArn: string;
}

/**
 * Build the resource name of a topic published by a service
 */
export function topicResourceName(
  app: string,
  env: string,
  service: string,
  topic: string,
) {
  return `${app}-${env}-${service}-${topic}`;
}

/**
 * Parse an ARN into the topic it names within an application environment
 *
 * ARNs have the shape `arn:<partition>:<service>:<region>:<account>:<resource>`.
 * Only resources named `<app>-<env>-...` belong to the environment; topics of
 * other environments are reported as not being a topic of this one.
 */
export function parseTopicArn(
  arn: string,
  app: string,
  env: string,
): ParsedTopicArn {
  const parts = arn.split(":");

  if (parts.length < 6 || parts[0] !== "arn") {
    return { kind: "not-a-topic", arn, reason: "malformed ARN" };
  }

  const resource = parts.slice(5).join(":");
  const prefix = `${app}-${env}-`;

  if (!resource.startsWith(prefix) || resource.length === prefix.length) {
    return {
      kind: "not-a-topic",
      arn,
      reason: `resource ${resource} does not belong to environment ${env}`,
    };
  }

  return {
    kind: "topic",
    topic: {
      arn,
      application: app,
      environment: env,
      name: resource.slice(prefix.length),
      resource,
    },
  };
}

/**
 * Parse all ARNs, dropping those that do not name a topic of the environment
 */
export function parseTopics(arns: readonly string[], app: string, env: string) {
  return arns.flatMap((arn) => {
    const parsed = parseTopicArn(arn, app, env);

    if (parsed.kind === "not-a-topic") {
      core.debug(`Ignoring ${arn}: ${parsed.reason}`);

      return [];
    }

    return [parsed.topic];
  });
}

/**
 * Validate that every subscription refers to a topic deployed in the
 * environment
 *
 * Subscriptions are checked in order; the first one without a matching topic
 * fails validation.
 */
export function validateTopicsExist(
  subscriptions: readonly TopicSubscription[] | undefined,
  topicArns: readonly string[],
  app: string,
  env: string,
) {
  resolveSubscriptions(subscriptions ?? [], topicArns, app, env);
}

/**
 * Match every subscription to the ARN of the topic it consumes from
 */
export function resolveSubscriptions(
  subscriptions: readonly TopicSubscription[],
  topicArns: readonly string[],
  app: string,
  env: string,
): ResolvedSubscription[] {
  if (subscriptions.length === 0) {
    return [];
  }

  const topics = new Map(
    parseTopics(topicArns, app, env).map((topic) => [topic.resource, topic]),
  );

  return subscriptions.map((subscription) => {
    const resource = topicResourceName(
      app,
      env,
      subscription.service,
      subscription.name,
    );
    const topic = topics.get(resource);

    if (!topic) {
      throw new MissingTopicError(resource, env);
    }

    return { ...subscription, topicArn: topic.arn };
  });
}
