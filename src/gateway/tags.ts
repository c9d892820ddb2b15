import { err, ok, type Result } from "neverthrow";
import { configError, type BuildError } from "../core/errors.js";
import type { Tags } from "../model/elbv2.js";
import type { NamespacedName } from "./inputs.js";

export type TagPrecedence = "defaultsWin" | "overrideWins";

export const CLUSTER_TAG_KEY = "elbv2.k8s.aws/cluster";
export const STACK_TAG_KEY = "gateway.k8s.aws/stack";

/**
 * Merges default and per-object tags. Later sources win, so precedence is expressed purely by
 * argument order. Object tags may never set a key from `reservedKeys`.
 */
export const resolveTags = (
  defaultTags: Tags,
  objectTags: Tags | undefined,
  precedence: TagPrecedence,
  reservedKeys: ReadonlySet<string>,
): Result<Tags, BuildError> => {
  const overrides = objectTags ?? {};
  for (const key of Object.keys(overrides)) {
    if (reservedKeys.has(key)) {
      return err(configError(`tag key ${key} is an external managed tag key`));
    }
  }
  if (precedence === "defaultsWin") {
    return ok({ ...overrides, ...defaultTags });
  }
  return ok({ ...defaultTags, ...overrides });
};

export type TagHelper = {
  resolve(objectTags: Tags | undefined): Result<Tags, BuildError>;
};

export const createTagHelper = (
  defaultTags: Tags,
  precedence: TagPrecedence,
  externalManagedTags: readonly string[],
): TagHelper => {
  const reserved = new Set(externalManagedTags);
  return {
    resolve: (objectTags) => resolveTags(defaultTags, objectTags, precedence, reserved),
  };
};

// Identifies load balancers this controller previously provisioned for a Gateway.
export const stackTrackingTags = (clusterName: string, gateway: NamespacedName): Tags => ({
  [CLUSTER_TAG_KEY]: clusterName,
  [STACK_TAG_KEY]: `${gateway.namespace}/${gateway.name}`,
});
