import type { Resource } from "../core/stack.js";
import { ref, type StringToken } from "../core/tokens.js";

export const LOAD_BALANCER = "AWS::ElasticLoadBalancingV2::LoadBalancer";
export const LISTENER = "AWS::ElasticLoadBalancingV2::Listener";
export const LISTENER_RULE = "AWS::ElasticLoadBalancingV2::ListenerRule";
export const TARGET_GROUP = "AWS::ElasticLoadBalancingV2::TargetGroup";

export type LoadBalancerType = "application" | "network";
export type LoadBalancerScheme = "internal" | "internet-facing";
export type IPAddressType = "ipv4" | "dualstack" | "dualstack-without-public-ipv4";
export type TargetGroupIPAddressType = "ipv4" | "ipv6";
export type TargetType = "instance" | "ip" | "alb";
export type ProtocolVersion = "HTTP1" | "HTTP2" | "GRPC";

export type Protocol =
  | "HTTP"
  | "HTTPS"
  | "TCP"
  | "TLS"
  | "UDP"
  | "TCP_UDP"
  | "QUIC"
  | "TCP_QUIC";

export const HEALTH_CHECK_PORT_TRAFFIC_PORT = "traffic-port";

export type Attribute = {
  readonly key: string;
  readonly value: string;
};

export type Tags = Readonly<Record<string, string>>;

export const isIPv6Supported = (ipAddressType: IPAddressType): boolean =>
  ipAddressType === "dualstack" || ipAddressType === "dualstack-without-public-ipv4";

export const isSecureProtocol = (protocol: Protocol): boolean =>
  protocol === "HTTPS" || protocol === "TLS";

// Load balancer

export type SubnetMapping = {
  subnetID: string;
  allocationID?: string;
  privateIPv4Address?: string;
  ipv6Address?: string;
  sourceNatIPv6Prefix?: string;
};

export type LoadBalancerSpec = {
  readonly name: string;
  readonly type: LoadBalancerType;
  readonly scheme: LoadBalancerScheme;
  readonly ipAddressType: IPAddressType;
  readonly subnetMappings: readonly SubnetMapping[];
  readonly securityGroups: readonly StringToken[];
  readonly customerOwnedIPv4Pool?: string;
  readonly ipv4IPAMPoolID?: string;
  readonly enforceSecurityGroupInboundRulesOnPrivateLinkTraffic?: string;
  readonly loadBalancerAttributes: readonly Attribute[];
  readonly tags: Tags;
};

export type LoadBalancer = Resource<typeof LOAD_BALANCER, LoadBalancerSpec>;

export const loadBalancerARN = (id: string): StringToken => ref(LOAD_BALANCER, id, "loadBalancerARN");

// Actions

export type TargetGroupTuple = {
  readonly targetGroupARN: StringToken;
  readonly weight?: number;
};

export type TargetGroupStickinessConfig = {
  readonly enabled?: boolean;
  readonly durationSeconds?: number;
};

export type ForwardActionConfig = {
  readonly targetGroups: readonly TargetGroupTuple[];
  readonly targetGroupStickinessConfig?: TargetGroupStickinessConfig;
};

export type RedirectActionConfig = {
  readonly protocol?: string;
  readonly port?: string;
  readonly host?: string;
  readonly path?: string;
  readonly query?: string;
  readonly statusCode: string;
};

export type FixedResponseActionConfig = {
  readonly statusCode: string;
  readonly contentType?: string;
  readonly messageBody?: string;
};

export type AuthenticateOIDCActionConfig = {
  readonly issuer: string;
  readonly authorizationEndpoint: string;
  readonly tokenEndpoint: string;
  readonly userInfoEndpoint: string;
  readonly clientID: string;
  readonly clientSecret: string;
  readonly scope?: string;
  readonly sessionCookieName?: string;
  readonly sessionTimeout?: number;
  readonly authenticationRequestExtraParams?: Readonly<Record<string, string>>;
  readonly onUnauthenticatedRequest?: string;
  readonly useExistingClientSecret?: boolean;
};

export type AuthenticateCognitoActionConfig = {
  readonly userPoolARN: string;
  readonly userPoolClientID: string;
  readonly userPoolDomain: string;
  readonly scope?: string;
  readonly sessionCookieName?: string;
  readonly sessionTimeout?: number;
  readonly authenticationRequestExtraParams?: Readonly<Record<string, string>>;
  readonly onUnauthenticatedRequest?: string;
};

export type Action =
  | { readonly type: "forward"; readonly forwardConfig: ForwardActionConfig }
  | { readonly type: "redirect"; readonly redirectConfig: RedirectActionConfig }
  | { readonly type: "fixed-response"; readonly fixedResponseConfig: FixedResponseActionConfig }
  | {
      readonly type: "authenticate-oidc";
      readonly authenticateOIDCConfig: AuthenticateOIDCActionConfig;
    }
  | {
      readonly type: "authenticate-cognito";
      readonly authenticateCognitoConfig: AuthenticateCognitoActionConfig;
    };

// Listener

export type Certificate = {
  readonly certificateARN: string;
};

export type MutualAuthenticationMode = "off" | "passthrough" | "verify";

export type MutualAuthenticationAttributes = {
  readonly mode: MutualAuthenticationMode;
  readonly trustStoreARN?: string;
  readonly ignoreClientCertificateExpiry?: boolean;
  readonly advertiseTrustStoreCaNames?: "on" | "off";
};

export type ListenerSpec = {
  readonly loadBalancerARN: StringToken;
  readonly port: number;
  readonly protocol: Protocol;
  readonly defaultActions: readonly Action[];
  readonly certificates: readonly Certificate[];
  readonly sslPolicy?: string;
  readonly alpnPolicy?: readonly string[];
  readonly mutualAuthentication?: MutualAuthenticationAttributes;
  readonly listenerAttributes: readonly Attribute[];
  readonly tags: Tags;
};

export type Listener = Resource<typeof LISTENER, ListenerSpec>;

export const listenerARN = (id: string): StringToken => ref(LISTENER, id, "listenerARN");

// Listener rule

export type RuleCondition = {
  readonly field:
    | "host-header"
    | "path-pattern"
    | "http-header"
    | "http-request-method"
    | "query-string"
    | "source-ip";
  readonly hostHeaderConfig?: { readonly values: readonly string[] };
  readonly pathPatternConfig?: { readonly values: readonly string[] };
  readonly httpHeaderConfig?: {
    readonly httpHeaderName: string;
    readonly values: readonly string[];
  };
  readonly httpRequestMethodConfig?: { readonly values: readonly string[] };
  readonly queryStringConfig?: {
    readonly values: readonly { readonly key?: string; readonly value: string }[];
  };
  readonly sourceIPConfig?: { readonly values: readonly string[] };
};

export type ListenerRuleSpec = {
  readonly listenerARN: StringToken;
  readonly priority: number;
  readonly conditions: readonly RuleCondition[];
  readonly actions: readonly Action[];
  readonly tags: Tags;
};

export type ListenerRule = Resource<typeof LISTENER_RULE, ListenerRuleSpec>;

// Target group

export type HealthCheckMatcher = {
  readonly httpCode?: string;
  readonly grpcCode?: string;
};

export type HealthCheckPort = number | typeof HEALTH_CHECK_PORT_TRAFFIC_PORT;

export type TargetGroupHealthCheckConfig = {
  readonly port: HealthCheckPort;
  readonly protocol: Protocol;
  readonly path?: string;
  readonly matcher?: HealthCheckMatcher;
  readonly intervalSeconds: number;
  readonly timeoutSeconds: number;
  readonly healthyThresholdCount: number;
  readonly unhealthyThresholdCount: number;
};

export type TargetGroupSpec = {
  readonly name: string;
  readonly targetType: TargetType;
  readonly port: number;
  readonly protocol: Protocol;
  readonly protocolVersion?: ProtocolVersion;
  readonly ipAddressType: TargetGroupIPAddressType;
  readonly healthCheckConfig: TargetGroupHealthCheckConfig;
  readonly targetGroupAttributes: readonly Attribute[];
  readonly tags: Tags;
};

export type TargetGroup = Resource<typeof TARGET_GROUP, TargetGroupSpec>;

export const targetGroupARN = (id: string): StringToken => ref(TARGET_GROUP, id, "targetGroupARN");
