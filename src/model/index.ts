import { Stack, type StackID } from "../core/stack.js";
import type { SecurityGroup } from "./ec2.js";
import type { Listener, ListenerRule, LoadBalancer, TargetGroup } from "./elbv2.js";
import type { TargetGroupBinding } from "./k8s.js";

export * from "./ec2.js";
export * from "./elbv2.js";
export * from "./k8s.js";

export type ModelResource =
  | LoadBalancer
  | Listener
  | ListenerRule
  | TargetGroup
  | SecurityGroup
  | TargetGroupBinding;

export type ModelStack = Stack<ModelResource>;

export const newModelStack = (stackID: StackID): ModelStack => new Stack<ModelResource>(stackID);
