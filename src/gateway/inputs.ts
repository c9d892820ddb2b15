import { z } from "zod";

const StringMapSchema = z.record(z.string(), z.string());

const KeyValueSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export const NamespacedNameSchema = z.object({
  namespace: z.string(),
  name: z.string(),
});

export type NamespacedName = z.infer<typeof NamespacedNameSchema>;

export const namespacedNameKey = (nn: NamespacedName): string => `${nn.namespace}/${nn.name}`;

// Gateway

export const GatewayListenerProtocolSchema = z.enum(["HTTP", "HTTPS", "TCP", "UDP", "TLS"]);

export const GatewayListenerSchema = z.object({
  name: z.string(),
  port: z.number().int().min(1).max(65535),
  protocol: GatewayListenerProtocolSchema,
  hostname: z.string().optional(),
  tls: z
    .object({
      mode: z.enum(["Terminate", "Passthrough"]).optional(),
    })
    .optional(),
});

export const GatewaySchema = z.object({
  metadata: z.object({
    namespace: z.string(),
    name: z.string(),
    uid: z.string().optional(),
    deletionTimestamp: z.string().optional(),
  }),
  spec: z.object({
    gatewayClassName: z.string().optional(),
    listeners: z.array(GatewayListenerSchema),
    infrastructure: z
      .object({
        labels: StringMapSchema.optional(),
        annotations: StringMapSchema.optional(),
      })
      .optional(),
  }),
});

export type Gateway = z.infer<typeof GatewaySchema>;
export type GatewayListener = z.infer<typeof GatewayListenerSchema>;
export type GatewayListenerProtocol = z.infer<typeof GatewayListenerProtocolSchema>;

// Service

export const ServicePortSchema = z.object({
  name: z.string().optional(),
  protocol: z.enum(["TCP", "UDP", "SCTP"]).optional(),
  port: z.number().int(),
  targetPort: z.union([z.number().int(), z.string()]),
  nodePort: z.number().int().optional(),
});

export const ServiceSchema = z.object({
  metadata: NamespacedNameSchema,
  spec: z.object({
    type: z.enum(["ClusterIP", "NodePort", "LoadBalancer"]).optional(),
    externalTrafficPolicy: z.enum(["Cluster", "Local"]).optional(),
    healthCheckNodePort: z.number().int().optional(),
    ipFamilies: z.array(z.enum(["IPv4", "IPv6"])).optional(),
    ports: z.array(ServicePortSchema),
  }),
});

export type Service = z.infer<typeof ServiceSchema>;
export type ServicePort = z.infer<typeof ServicePortSchema>;

// TargetGroupConfiguration

export const TargetGroupPropsSchema = z.object({
  targetGroupName: z.string().optional(),
  ipAddressType: z.enum(["ipv4", "ipv6"]).optional(),
  healthCheckConfig: z
    .object({
      healthyThresholdCount: z.number().int().optional(),
      healthCheckInterval: z.number().int().optional(),
      healthCheckPath: z.string().optional(),
      healthCheckPort: z.string().optional(),
      healthCheckProtocol: z.enum(["HTTP", "HTTPS", "TCP"]).optional(),
      healthCheckTimeout: z.number().int().optional(),
      unhealthyThresholdCount: z.number().int().optional(),
      matcher: z
        .object({
          httpCode: z.string().optional(),
          grpcCode: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  nodeSelector: z.object({ matchLabels: StringMapSchema.optional() }).optional(),
  targetGroupAttributes: z.array(KeyValueSchema).optional(),
  targetType: z.enum(["instance", "ip"]).optional(),
  protocol: z.enum(["HTTP", "HTTPS", "TCP", "TLS", "UDP", "TCP_UDP"]).optional(),
  protocolVersion: z.enum(["HTTP1", "HTTP2", "GRPC"]).optional(),
  enableMultiCluster: z.boolean().optional(),
  targetControlPort: z.number().int().optional(),
  tags: StringMapSchema.optional(),
});

export type TargetGroupProps = z.infer<typeof TargetGroupPropsSchema>;

// ListenerRuleConfiguration

const AuthenticateOIDCConfigSchema = z.object({
  authorizationEndpoint: z.string(),
  issuer: z.string(),
  tokenEndpoint: z.string(),
  userInfoEndpoint: z.string(),
  secret: z.object({ name: z.string() }),
  scope: z.string().optional(),
  sessionCookieName: z.string().optional(),
  sessionTimeout: z.number().int().optional(),
  authenticationRequestExtraParams: StringMapSchema.optional(),
  onUnauthenticatedRequest: z.enum(["deny", "allow", "authenticate"]).optional(),
  useExistingClientSecret: z.boolean().optional(),
});

const AuthenticateCognitoConfigSchema = z.object({
  userPoolArn: z.string(),
  userPoolClientId: z.string(),
  userPoolDomain: z.string(),
  scope: z.string().optional(),
  sessionCookieName: z.string().optional(),
  sessionTimeout: z.number().int().optional(),
  authenticationRequestExtraParams: StringMapSchema.optional(),
  onUnauthenticatedRequest: z.enum(["deny", "allow", "authenticate"]).optional(),
});

const RuleActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("forward"),
    forwardConfig: z
      .object({
        targetGroupStickinessConfig: z
          .object({
            enabled: z.boolean().optional(),
            durationSeconds: z.number().int().optional(),
          })
          .optional(),
      })
      .optional(),
  }),
  z.object({
    type: z.literal("redirect"),
    redirectConfig: z.object({ query: z.string().optional() }).optional(),
  }),
  z.object({
    type: z.literal("fixed-response"),
    fixedResponseConfig: z.object({
      statusCode: z.number().int(),
      contentType: z.string().optional(),
      messageBody: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("authenticate-oidc"),
    authenticateOIDCConfig: AuthenticateOIDCConfigSchema,
  }),
  z.object({
    type: z.literal("authenticate-cognito"),
    authenticateCognitoConfig: AuthenticateCognitoConfigSchema,
  }),
]);

export const ListenerRuleConfigurationSchema = z.object({
  actions: z.array(RuleActionSchema).optional(),
  tags: StringMapSchema.optional(),
});

export type ListenerRuleConfiguration = z.infer<typeof ListenerRuleConfigurationSchema>;
export type RuleActionConfig = z.infer<typeof RuleActionSchema>;

// LoadBalancerConfiguration

const SubnetConfigurationSchema = z.object({
  identifier: z.string().optional(),
  eipAllocation: z.string().optional(),
  privateIPv4Allocation: z.string().optional(),
  ipv6Allocation: z.string().optional(),
  sourceNatIPv6Prefix: z.string().optional(),
});

export type SubnetConfiguration = z.infer<typeof SubnetConfigurationSchema>;

const MutualAuthenticationConfigSchema = z.object({
  mode: z.enum(["off", "passthrough", "verify"]),
  trustStore: z.string().optional(),
  ignoreClientCertificateExpiry: z.boolean().optional(),
  advertiseTrustStoreCaNames: z.enum(["on", "off"]).optional(),
});

export const ListenerConfigurationSchema = z.object({
  protocolPort: z.string().regex(/^(HTTP|HTTPS|TLS|TCP|UDP)?:\d{1,5}$/),
  defaultCertificate: z.string().optional(),
  certificates: z.array(z.string()).optional(),
  sslPolicy: z.string().optional(),
  alpnPolicy: z.string().optional(),
  mutualAuthentication: MutualAuthenticationConfigSchema.optional(),
  listenerAttributes: z.array(KeyValueSchema).optional(),
  quicEnabled: z.boolean().optional(),
});

export type ListenerConfiguration = z.infer<typeof ListenerConfigurationSchema>;

export const LoadBalancerConfigurationSpecSchema = z.object({
  loadBalancerName: z.string().min(1).max(32).optional(),
  scheme: z.string().optional(),
  ipAddressType: z.string().optional(),
  enforceSecurityGroupInboundRulesOnPrivateLinkTraffic: z.string().optional(),
  customerOwnedIpv4Pool: z.string().optional(),
  ipv4IPAMPoolId: z.string().optional(),
  loadBalancerSubnets: z.array(SubnetConfigurationSchema).optional(),
  loadBalancerSubnetsSelector: z.record(z.string(), z.array(z.string())).optional(),
  listenerConfigurations: z.array(ListenerConfigurationSchema).optional(),
  securityGroups: z.array(z.string()).optional(),
  securityGroupPrefixes: z.array(z.string()).optional(),
  sourceRanges: z.array(z.string()).optional(),
  loadBalancerAttributes: z.array(KeyValueSchema).optional(),
  tags: StringMapSchema.optional(),
  enableICMP: z.boolean().optional(),
  manageBackendSecurityGroupRules: z.boolean().optional(),
});

export type LoadBalancerConfigurationSpec = z.infer<typeof LoadBalancerConfigurationSpecSchema>;

export const LoadBalancerConfigurationSchema = z.object({
  spec: LoadBalancerConfigurationSpecSchema,
});

export type LoadBalancerConfiguration = z.infer<typeof LoadBalancerConfigurationSchema>;

export const emptyLoadBalancerConfiguration = (): LoadBalancerConfiguration => ({ spec: {} });
