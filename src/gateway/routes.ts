import type { RuleCondition } from "../model/elbv2.js";
import type {
  ListenerRuleConfiguration,
  NamespacedName,
  Service,
  ServicePort,
  TargetGroupProps,
} from "./inputs.js";

export type RouteKind = "HTTPRoute" | "GRPCRoute" | "TCPRoute" | "UDPRoute" | "TLSRoute";

export const isL4RouteKind = (kind: RouteKind): boolean =>
  kind === "TCPRoute" || kind === "UDPRoute" || kind === "TLSRoute";

export type ServiceBackend = {
  readonly kind: "service";
  readonly weight: number;
  readonly service: Service;
  readonly servicePort: ServicePort;
  readonly targetGroupProps?: TargetGroupProps;
};

// An existing target group referenced by name.
export type LiteralTargetGroupBackend = {
  readonly kind: "literalTargetGroup";
  readonly weight: number;
  readonly targetGroupName: string;
};

// An application load balancer provisioned for another Gateway, fronted by this network load balancer.
export type GatewayBackend = {
  readonly kind: "gateway";
  readonly weight: number;
  readonly gateway: NamespacedName;
  readonly albARN: string;
  readonly listenerPort: number;
  readonly targetGroupProps?: TargetGroupProps;
};

export type Backend = ServiceBackend | LiteralTargetGroupBackend | GatewayBackend;

export type RequestRedirectFilter = {
  readonly scheme?: string;
  readonly hostname?: string;
  readonly port?: number;
  readonly statusCode?: number;
  readonly path?:
    | { readonly type: "ReplaceFullPath"; readonly replaceFullPath: string }
    | { readonly type: "ReplacePrefixMatch"; readonly replacePrefixMatch: string };
};

/**
 * One matched route rule. Conditions are produced by the route matcher; this package never
 * interprets route match semantics itself.
 */
export type RouteRule = {
  getBackends(): readonly Backend[];
  getListenerRuleConfig(): ListenerRuleConfiguration | undefined;
  getConditions(): readonly RuleCondition[];
  getRedirect(): RequestRedirectFilter | undefined;
};

export type RouteDescriptor = {
  getRouteNamespacedName(): NamespacedName;
  getRouteKind(): RouteKind;
  getHostnames(): readonly string[];
  getCompatibleHostnamesByPort(): ReadonlyMap<number, readonly string[]>;
  getAttachedRules(): readonly RouteRule[];
};

export type RoutesByPort = ReadonlyMap<number, readonly RouteDescriptor[]>;

export type RulePrecedenceSorter = (
  routes: readonly RouteDescriptor[],
) => readonly { readonly route: RouteDescriptor; readonly rule: RouteRule }[];

// Keeps route order, then rule order within each route.
export const declarationOrderSorter: RulePrecedenceSorter = (routes) =>
  routes.flatMap((route) => route.getAttachedRules().map((rule) => ({ route, rule })));
