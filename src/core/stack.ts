import { err, ok, type Result } from "neverthrow";
import type { BuildError } from "./errors.js";
import { renderTokens } from "./tokens.js";

export type Resource<T extends string = string, S = unknown> = {
  readonly resourceType: T;
  readonly id: string;
  readonly spec: S;
};

export type StackID = {
  readonly namespace: string;
  readonly name: string;
};

const resourceKey = (resourceType: string, id: string): string => `${resourceType}|${id}`;

/**
 * Holds every resource produced by one compilation pass, keyed by (type, id).
 */
export class Stack<R extends Resource = Resource> {
  readonly stackID: StackID;
  private readonly resources = new Map<string, R>();

  constructor(stackID: StackID) {
    this.stackID = stackID;
  }

  add<T extends R>(resource: T): Result<T, BuildError> {
    const key = resourceKey(resource.resourceType, resource.id);
    if (this.resources.has(key)) {
      return err({
        kind: "duplicate_resource",
        resourceType: resource.resourceType,
        resourceId: resource.id,
        message: `resource ${resource.resourceType}/${resource.id} already exists in stack`,
      });
    }
    this.resources.set(key, resource);
    return ok(resource);
  }

  get<K extends R["resourceType"]>(
    resourceType: K,
    id: string,
  ): Extract<R, { resourceType: K }> | undefined {
    return this.list(resourceType).find((r) => r.id === id);
  }

  list<K extends R["resourceType"]>(resourceType: K): readonly Extract<R, { resourceType: K }>[] {
    const out: Extract<R, { resourceType: K }>[] = [];
    for (const resource of this.resources.values()) {
      if (isOfType(resource, resourceType)) {
        out.push(resource);
      }
    }
    return out;
  }

  get size(): number {
    return this.resources.size;
  }

  toJSON(): Record<string, Record<string, unknown>> {
    const out: Record<string, Record<string, unknown>> = {};
    for (const resource of this.resources.values()) {
      const group = out[resource.resourceType] ?? {};
      group[resource.id] = renderTokens(resource.spec);
      out[resource.resourceType] = group;
    }
    return out;
  }
}

function isOfType<R extends Resource, K extends R["resourceType"]>(
  resource: R,
  resourceType: K,
): resource is Extract<R, { resourceType: K }> {
  return resource.resourceType === resourceType;
}
