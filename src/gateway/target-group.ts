import { err, ok, type Result } from "neverthrow";
import { callCollaborator, configError, type BuildError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { hashedResourceName, sha256Hex } from "../core/naming.js";
import { literal, type StringToken } from "../core/tokens.js";
import {
  HEALTH_CHECK_PORT_TRAFFIC_PORT,
  TARGET_GROUP,
  isIPv6Supported,
  targetGroupARN,
  type Attribute,
  type HealthCheckMatcher,
  type HealthCheckPort,
  type IPAddressType,
  type LoadBalancerType,
  type Protocol,
  type ProtocolVersion,
  type TargetGroup,
  type TargetGroupHealthCheckConfig,
  type TargetGroupIPAddressType,
  type TargetGroupSpec,
  type TargetType,
} from "../model/elbv2.js";
import type { ModelStack } from "../model/index.js";
import {
  TARGET_GROUP_BINDING,
  type LabelSelector,
  type TargetGroupBinding,
} from "../model/k8s.js";
import type { TargetGroupARNMapper } from "./collaborators.js";
import type { Gateway, NamespacedName, Service, TargetGroupProps } from "./inputs.js";
import type { TagHelper } from "./tags.js";
import type { TargetGroupBindingNetworkBuilder } from "./tgb-network.js";
import type {
  Backend,
  GatewayBackend,
  LiteralTargetGroupBackend,
  RouteDescriptor,
  RouteKind,
  ServiceBackend,
} from "./routes.js";

export const DEFAULT_HEALTH_CHECK_PATH_HTTP = "/";
export const DEFAULT_HEALTH_CHECK_PATH_GRPC = "/AWS.ALB/healthcheck";
export const DEFAULT_HEALTH_CHECK_PATH_LOCAL = "/healthz";
export const DEFAULT_HEALTH_CHECK_MATCHER_HTTP = "200-399";
export const DEFAULT_HEALTH_CHECK_MATCHER_GRPC = "12";

type HealthCheckTimings = {
  readonly intervalSeconds: number;
  readonly timeoutSeconds: number;
  readonly healthyThresholdCount: number;
  readonly unhealthyThresholdCount: number;
};

const DEFAULT_TIMINGS: HealthCheckTimings = {
  intervalSeconds: 15,
  timeoutSeconds: 5,
  healthyThresholdCount: 3,
  unhealthyThresholdCount: 3,
};

// Instance targets behind an NLB for a Service with externalTrafficPolicy=Local.
const LOCAL_TIMINGS: HealthCheckTimings = {
  intervalSeconds: 10,
  timeoutSeconds: 6,
  healthyThresholdCount: 2,
  unhealthyThresholdCount: 2,
};

export type FrontendNlbTarget = {
  readonly targetGroupName: string;
  readonly albARN: string;
  readonly port: number;
  readonly targetPort: number;
};

export type BuildTargetGroupInput = {
  readonly stack: ModelStack;
  readonly gateway: Gateway;
  readonly listenerPort: number;
  readonly lbIPType: IPAddressType;
  readonly route: RouteDescriptor;
  readonly backend: Backend;
};

export type TargetGroupBuilder = {
  buildTargetGroup(input: BuildTargetGroupInput): Promise<Result<StringToken, BuildError>>;
  targetGroupNameToARN(): ReadonlyMap<string, StringToken>;
  frontendNlbTargets(): readonly FrontendNlbTarget[];
};

export type TargetGroupBuilderOptions = {
  readonly clusterName: string;
  readonly vpcID: string;
  readonly loadBalancerType: LoadBalancerType;
  readonly defaultTargetType: TargetType;
  readonly tagHelper: TagHelper;
  readonly tgbNetworkBuilder: TargetGroupBindingNetworkBuilder;
  readonly targetGroupARNMapper: TargetGroupARNMapper;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};

const gatewayKey = (gateway: Gateway): NamespacedName => ({
  namespace: gateway.metadata.namespace,
  name: gateway.metadata.name,
});

export const buildTargetGroupResourceID = (
  gwKey: NamespacedName,
  backendKey: NamespacedName,
  routeKey: NamespacedName,
  routeKind: RouteKind,
  port: number | string,
  targetControlPort?: number,
): string => {
  const id = `${gwKey.namespace}/${gwKey.name}:${routeKey.namespace}-${routeKey.name}:${routeKind}-${backendKey.namespace}-${backendKey.name}:${port}`;
  return targetControlPort === undefined ? id : `${id}:${targetControlPort}`;
};

export type TargetGroupNameInput = {
  readonly clusterName: string;
  readonly gwKey: NamespacedName;
  readonly routeKey: NamespacedName;
  readonly routeKind: RouteKind;
  readonly backendKey: NamespacedName;
  readonly port: number;
  readonly targetType: TargetType;
  readonly protocol: Protocol;
  readonly protocolVersion?: ProtocolVersion;
};

export const buildTargetGroupName = (
  props: TargetGroupProps | undefined,
  input: TargetGroupNameInput,
): string => {
  if (props?.targetGroupName !== undefined) {
    return props.targetGroupName;
  }
  const parts = [
    input.clusterName,
    input.gwKey.namespace,
    input.gwKey.name,
    input.routeKey.namespace,
    input.routeKey.name,
    input.routeKind,
    input.backendKey.namespace,
    input.backendKey.name,
    String(input.port),
    input.targetType,
    input.protocol,
  ];
  if (input.protocolVersion !== undefined) {
    parts.push(input.protocolVersion);
  }
  return hashedResourceName(input.routeKey.namespace, input.routeKey.name, sha256Hex(parts));
};

export const inferTargetGroupProtocol = (
  lbType: LoadBalancerType,
  routeKind: RouteKind,
): Protocol => {
  switch (routeKind) {
    case "TCPRoute":
      return "TCP";
    case "UDPRoute":
      return "UDP";
    case "HTTPRoute":
    case "GRPCRoute":
      return "HTTP";
    case "TLSRoute":
      return lbType === "network" ? "TLS" : "HTTPS";
  }
};

const L7_PROTOCOLS: readonly Protocol[] = ["HTTP", "HTTPS"];
const L4_PROTOCOLS: readonly Protocol[] = ["TCP", "TLS", "UDP", "TCP_UDP"];

export const buildTargetGroupProtocol = (
  lbType: LoadBalancerType,
  props: TargetGroupProps | undefined,
  routeKind: RouteKind,
): Result<Protocol, BuildError> => {
  const override = props?.protocol;
  if (override === undefined) {
    return ok(inferTargetGroupProtocol(lbType, routeKind));
  }
  const allowed = lbType === "application" ? L7_PROTOCOLS : L4_PROTOCOLS;
  if (!allowed.includes(override)) {
    return err(configError(`backend protocol must be within [${allowed.join(", ")}]: ${override}`));
  }
  return ok(override);
};

export const buildTargetGroupProtocolVersion = (
  lbType: LoadBalancerType,
  props: TargetGroupProps | undefined,
  routeKind: RouteKind,
): ProtocolVersion | undefined => {
  if (lbType === "network") {
    return undefined;
  }
  if (props?.protocolVersion !== undefined) {
    return props.protocolVersion;
  }
  return routeKind === "GRPCRoute" ? "GRPC" : "HTTP1";
};

const parsePort = (value: string): number | undefined => (/^\d+$/.test(value) ? Number(value) : undefined);

export const buildHealthCheckPort = (
  props: TargetGroupProps | undefined,
  targetType: TargetType,
  service: Service,
  isLocal: boolean,
): Result<HealthCheckPort, BuildError> => {
  const configured = props?.healthCheckConfig?.healthCheckPort;
  if (configured === undefined && isLocal) {
    return ok(service.spec.healthCheckNodePort ?? 0);
  }
  if (configured === undefined || configured === HEALTH_CHECK_PORT_TRAFFIC_PORT) {
    return ok(HEALTH_CHECK_PORT_TRAFFIC_PORT);
  }
  const numeric = parsePort(configured);
  if (numeric !== undefined) {
    return ok(numeric);
  }
  const svcPort = service.spec.ports.find((p) => p.name === configured);
  if (svcPort === undefined) {
    return err(
      configError(
        `unable to find port ${configured} on service ${service.metadata.namespace}/${service.metadata.name}`,
      ),
    );
  }
  if (targetType === "instance") {
    return ok(svcPort.nodePort ?? 0);
  }
  if (typeof svcPort.targetPort === "number") {
    return ok(svcPort.targetPort);
  }
  return err(
    configError(
      "cannot use named healthCheckPort for IP TargetType when service's targetPort is a named port",
    ),
  );
};

const buildHealthCheckProtocol = (
  lbType: LoadBalancerType,
  props: TargetGroupProps | undefined,
  tgProtocol: Protocol,
  isLocal: boolean,
): Protocol => {
  const configured = props?.healthCheckConfig?.healthCheckProtocol;
  if (configured !== undefined) {
    return configured;
  }
  if (lbType === "network") {
    return isLocal ? "HTTP" : "TCP";
  }
  return tgProtocol;
};

const buildHealthCheckPath = (
  props: TargetGroupProps | undefined,
  protocolVersion: ProtocolVersion | undefined,
  hcProtocol: Protocol,
  isLocal: boolean,
): string | undefined => {
  if (hcProtocol === "TCP") {
    return undefined;
  }
  const configured = props?.healthCheckConfig?.healthCheckPath;
  if (configured !== undefined) {
    return configured;
  }
  if (protocolVersion === "GRPC") {
    return DEFAULT_HEALTH_CHECK_PATH_GRPC;
  }
  return isLocal ? DEFAULT_HEALTH_CHECK_PATH_LOCAL : DEFAULT_HEALTH_CHECK_PATH_HTTP;
};

const buildHealthCheckMatcher = (
  props: TargetGroupProps | undefined,
  protocolVersion: ProtocolVersion | undefined,
  hcProtocol: Protocol,
): HealthCheckMatcher | undefined => {
  if (hcProtocol === "TCP") {
    return undefined;
  }
  const matcher = props?.healthCheckConfig?.matcher;
  if (protocolVersion === "GRPC") {
    return { grpcCode: matcher?.grpcCode ?? DEFAULT_HEALTH_CHECK_MATCHER_GRPC };
  }
  return { httpCode: matcher?.httpCode ?? DEFAULT_HEALTH_CHECK_MATCHER_HTTP };
};

const buildHealthCheckTimings = (
  props: TargetGroupProps | undefined,
  isLocal: boolean,
): HealthCheckTimings => {
  const defaults = isLocal ? LOCAL_TIMINGS : DEFAULT_TIMINGS;
  const hc = props?.healthCheckConfig;
  return {
    intervalSeconds: hc?.healthCheckInterval ?? defaults.intervalSeconds,
    timeoutSeconds: hc?.healthCheckTimeout ?? defaults.timeoutSeconds,
    healthyThresholdCount: hc?.healthyThresholdCount ?? defaults.healthyThresholdCount,
    unhealthyThresholdCount: hc?.unhealthyThresholdCount ?? defaults.unhealthyThresholdCount,
  };
};

export const buildTargetGroupAttributes = (props: TargetGroupProps | undefined): readonly Attribute[] => {
  const attributes = new Map<string, string>();
  for (const attr of props?.targetGroupAttributes ?? []) {
    attributes.set(attr.key, attr.value);
  }
  return [...attributes.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => ({ key, value }));
};

export const buildTargetGroupIPAddressType = (
  service: Service,
  lbIPType: IPAddressType,
): Result<TargetGroupIPAddressType, BuildError> => {
  const ipv6Configured = (service.spec.ipFamilies ?? []).includes("IPv6");
  if (!ipv6Configured) {
    return ok("ipv4");
  }
  if (!isIPv6Supported(lbIPType)) {
    return err(configError("unsupported IPv6 configuration, lb not dual-stack"));
  }
  return ok("ipv6");
};

// Targets are registered with explicit ports, so the group port only needs to be meaningful.
export const buildTargetGroupPort = (targetType: TargetType, backend: ServiceBackend): number => {
  if (targetType === "instance") {
    return backend.servicePort.nodePort ?? 0;
  }
  if (typeof backend.servicePort.targetPort === "number") {
    return backend.servicePort.targetPort;
  }
  return 1;
};

export const createTargetGroupBuilder = (options: TargetGroupBuilderOptions): TargetGroupBuilder => {
  const { clusterName, loadBalancerType } = options;
  const tgByResID = new Map<string, TargetGroup>();
  const nameToARN = new Map<string, StringToken>();
  const frontendTargets: FrontendNlbTarget[] = [];

  const register = (
    stack: ModelStack,
    resID: string,
    spec: TargetGroupSpec,
  ): Result<TargetGroup, BuildError> => {
    const tg: TargetGroup = { resourceType: TARGET_GROUP, id: resID, spec };
    const added = stack.add(tg);
    if (added.isErr()) {
      return err(added.error);
    }
    tgByResID.set(resID, tg);
    nameToARN.set(spec.name, targetGroupARN(resID));
    options.logger.debug("built target group", { id: resID, name: spec.name });
    return ok(tg);
  };

  const buildHealthCheckConfig = (
    props: TargetGroupProps | undefined,
    tgProtocol: Protocol,
    protocolVersion: ProtocolVersion | undefined,
    targetType: TargetType,
    service: Service,
  ): Result<TargetGroupHealthCheckConfig, BuildError> => {
    const isLocal =
      targetType === "instance" &&
      service.spec.externalTrafficPolicy === "Local" &&
      loadBalancerType === "network";

    const port = buildHealthCheckPort(props, targetType, service, isLocal);
    if (port.isErr()) {
      return err(port.error);
    }
    const protocol = buildHealthCheckProtocol(loadBalancerType, props, tgProtocol, isLocal);
    return ok({
      port: port.value,
      protocol,
      path: buildHealthCheckPath(props, protocolVersion, protocol, isLocal),
      matcher: buildHealthCheckMatcher(props, protocolVersion, protocol),
      ...buildHealthCheckTimings(props, isLocal),
    });
  };

  const buildTargetGroupSpec = (
    gateway: Gateway,
    route: RouteDescriptor,
    lbIPType: IPAddressType,
    backend: ServiceBackend,
  ): Result<TargetGroupSpec, BuildError> => {
    const props = backend.targetGroupProps;
    const targetType: TargetType = props?.targetType ?? options.defaultTargetType;
    const protocol = buildTargetGroupProtocol(loadBalancerType, props, route.getRouteKind());
    if (protocol.isErr()) {
      return err(protocol.error);
    }
    const protocolVersion = buildTargetGroupProtocolVersion(loadBalancerType, props, route.getRouteKind());

    const healthCheckConfig = buildHealthCheckConfig(
      props,
      protocol.value,
      protocolVersion,
      targetType,
      backend.service,
    );
    if (healthCheckConfig.isErr()) {
      return err(healthCheckConfig.error);
    }

    const ipAddressType = buildTargetGroupIPAddressType(backend.service, lbIPType);
    if (ipAddressType.isErr()) {
      return err(ipAddressType.error);
    }

    const tags = options.tagHelper.resolve(props?.tags);
    if (tags.isErr()) {
      return err(tags.error);
    }

    const port = buildTargetGroupPort(targetType, backend);
    if (port === 0) {
      return err(
        configError(
          targetType === "ip"
            ? "TargetGroup port is empty. Are you using the correct service type?"
            : "TargetGroup port is empty. When using Instance targets, your service must be of type 'NodePort' or 'LoadBalancer'",
        ),
      );
    }

    const name = buildTargetGroupName(props, {
      clusterName,
      gwKey: gatewayKey(gateway),
      routeKey: route.getRouteNamespacedName(),
      routeKind: route.getRouteKind(),
      backendKey: backend.service.metadata,
      port,
      targetType,
      protocol: protocol.value,
      protocolVersion,
    });

    return ok({
      name,
      targetType,
      port,
      protocol: protocol.value,
      protocolVersion,
      ipAddressType: ipAddressType.value,
      healthCheckConfig: healthCheckConfig.value,
      targetGroupAttributes: buildTargetGroupAttributes(props),
      tags: tags.value,
    });
  };

  const buildNodeSelector = (
    props: TargetGroupProps | undefined,
    targetType: TargetType,
  ): LabelSelector | undefined => (targetType === "instance" ? props?.nodeSelector : undefined);

  const fromService = async (
    input: BuildTargetGroupInput,
    backend: ServiceBackend,
  ): Promise<Result<StringToken, BuildError>> => {
    const { stack, gateway, route } = input;
    const props = backend.targetGroupProps;
    const resID = buildTargetGroupResourceID(
      gatewayKey(gateway),
      backend.service.metadata,
      route.getRouteNamespacedName(),
      route.getRouteKind(),
      backend.servicePort.targetPort,
      props?.targetControlPort,
    );
    if (tgByResID.has(resID)) {
      options.logger.debug("reusing target group", { id: resID });
      return ok(targetGroupARN(resID));
    }

    const spec = buildTargetGroupSpec(gateway, route, input.lbIPType, backend);
    if (spec.isErr()) {
      return err(spec.error);
    }

    const targetPort =
      spec.value.targetType === "instance"
        ? (backend.servicePort.nodePort ?? 0)
        : backend.servicePort.targetPort;
    const networking = await options.tgbNetworkBuilder.build(
      spec.value,
      targetPort,
      props?.targetControlPort,
    );
    if (networking.isErr()) {
      return err(networking.error);
    }

    const tg = register(stack, resID, spec.value);
    if (tg.isErr()) {
      return err(tg.error);
    }

    const infrastructure = gateway.spec.infrastructure;
    const binding: TargetGroupBinding = {
      resourceType: TARGET_GROUP_BINDING,
      id: tg.value.id,
      spec: {
        template: {
          metadata: {
            namespace: backend.service.metadata.namespace,
            name: spec.value.name,
            annotations: { ...infrastructure?.annotations },
            labels: { ...infrastructure?.labels },
          },
          spec: {
            targetGroupARN: targetGroupARN(tg.value.id),
            targetType: spec.value.targetType,
            serviceRef: { name: backend.service.metadata.name, port: backend.servicePort.port },
            networking: networking.value,
            nodeSelector: buildNodeSelector(props, spec.value.targetType),
            ipAddressType: spec.value.ipAddressType,
            vpcID: options.vpcID,
            multiClusterTargetGroup: props?.enableMultiCluster ?? false,
            targetGroupProtocol: spec.value.protocol,
          },
        },
      },
    };
    const added = stack.add(binding);
    if (added.isErr()) {
      return err(added.error);
    }
    return ok(targetGroupARN(tg.value.id));
  };

  const fromLiteralName = async (
    backend: LiteralTargetGroupBackend,
  ): Promise<Result<StringToken, BuildError>> => {
    const arn = await callCollaborator(
      `resolve target group ${backend.targetGroupName}`,
      () => options.targetGroupARNMapper.getARNByName(backend.targetGroupName, options.signal),
      options.signal,
    );
    if (arn.isErr()) {
      return err(arn.error);
    }
    const token = literal(arn.value);
    nameToARN.set(backend.targetGroupName, token);
    return ok(token);
  };

  const fromGateway = (
    input: BuildTargetGroupInput,
    backend: GatewayBackend,
  ): Result<StringToken, BuildError> => {
    if (loadBalancerType !== "network") {
      return err(configError("gateway backends are only supported on network load balancers"));
    }
    const { stack, gateway, route } = input;
    const props = backend.targetGroupProps;
    const resID = buildTargetGroupResourceID(
      gatewayKey(gateway),
      backend.gateway,
      route.getRouteNamespacedName(),
      route.getRouteKind(),
      backend.listenerPort,
    );
    if (tgByResID.has(resID)) {
      options.logger.debug("reusing target group", { id: resID });
      return ok(targetGroupARN(resID));
    }

    const protocol = buildTargetGroupProtocol(loadBalancerType, props, route.getRouteKind());
    if (protocol.isErr()) {
      return err(protocol.error);
    }
    const tags = options.tagHelper.resolve(props?.tags);
    if (tags.isErr()) {
      return err(tags.error);
    }

    const hc = props?.healthCheckConfig;
    const hcProtocol = hc?.healthCheckProtocol ?? "HTTP";
    const hcPort: HealthCheckPort =
      hc?.healthCheckPort === undefined || hc.healthCheckPort === HEALTH_CHECK_PORT_TRAFFIC_PORT
        ? HEALTH_CHECK_PORT_TRAFFIC_PORT
        : backend.listenerPort;

    const spec: TargetGroupSpec = {
      name: buildTargetGroupName(props, {
        clusterName,
        gwKey: gatewayKey(gateway),
        routeKey: route.getRouteNamespacedName(),
        routeKind: route.getRouteKind(),
        backendKey: backend.gateway,
        port: backend.listenerPort,
        targetType: "alb",
        protocol: protocol.value,
      }),
      targetType: "alb",
      port: backend.listenerPort,
      protocol: protocol.value,
      ipAddressType: "ipv4",
      healthCheckConfig: {
        port: hcPort,
        protocol: hcProtocol,
        path: buildHealthCheckPath(props, undefined, hcProtocol, false),
        matcher: buildHealthCheckMatcher(props, undefined, hcProtocol),
        ...buildHealthCheckTimings(props, false),
      },
      targetGroupAttributes: buildTargetGroupAttributes(props),
      tags: tags.value,
    };

    const tg = register(stack, resID, spec);
    if (tg.isErr()) {
      return err(tg.error);
    }
    frontendTargets.push({
      targetGroupName: spec.name,
      albARN: backend.albARN,
      port: input.listenerPort,
      targetPort: backend.listenerPort,
    });
    return ok(targetGroupARN(resID));
  };

  return {
    buildTargetGroup: async (input) => {
      const { backend } = input;
      switch (backend.kind) {
        case "service":
          return fromService(input, backend);
        case "literalTargetGroup":
          return fromLiteralName(backend);
        case "gateway":
          return fromGateway(input, backend);
      }
    },
    targetGroupNameToARN: () => nameToARN,
    frontendNlbTargets: () => frontendTargets,
  };
};
