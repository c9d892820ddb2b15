import { err, ok, type Result } from "neverthrow";
import { callCollaborator, configError, type BuildError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { StringToken } from "../core/tokens.js";
import {
  LISTENER,
  LISTENER_RULE,
  isSecureProtocol,
  listenerARN,
  type Action,
  type Attribute,
  type Certificate,
  type IPAddressType,
  type Listener,
  type ListenerRule,
  type ListenerSpec,
  type LoadBalancerType,
  type MutualAuthenticationAttributes,
  type Protocol,
  type TargetGroupTuple,
} from "../model/elbv2.js";
import type { ModelStack } from "../model/index.js";
import type {
  CertDiscovery,
  SecretsManager,
  SubnetsResolver,
  TrustStoreResolver,
} from "./collaborators.js";
import {
  namespacedNameKey,
  type Gateway,
  type ListenerConfiguration,
  type LoadBalancerConfigurationSpec,
  type NamespacedName,
} from "./inputs.js";
import type {
  RouteDescriptor,
  RouteRule,
  RoutesByPort,
  RulePrecedenceSorter,
} from "./routes.js";
import {
  buildFixedResponseAction,
  buildPreRoutingAction,
  buildRoutingAction,
  getPreRoutingAction,
  needsTargetGroups,
} from "./rule-actions.js";
import type { TagHelper } from "./tags.js";
import type { TargetGroupBuilder } from "./target-group.js";

export const ALPN_POLICIES = [
  "None",
  "HTTP1Only",
  "HTTP2Only",
  "HTTP2Optional",
  "HTTP2Preferred",
] as const;

export type GatewayListenerConfig = {
  readonly protocol: Protocol;
  readonly hostnames: readonly string[];
};

const gatewayNamespacedName = (gateway: Gateway): NamespacedName => ({
  namespace: gateway.metadata.namespace,
  name: gateway.metadata.name,
});

const COMBINED_PROTOCOLS: Readonly<Record<string, Protocol>> = {
  "TCP+UDP": "TCP_UDP",
  "TCP_UDP+TCP": "TCP_UDP",
  "TCP_UDP+UDP": "TCP_UDP",
  "TCP+QUIC": "TCP_QUIC",
  "TCP_QUIC+TCP": "TCP_QUIC",
  "TCP_QUIC+QUIC": "TCP_QUIC",
};

/**
 * Combines two protocols declared on the same port. Order does not matter.
 */
export const mergeProtocols = (stored: Protocol, proposed: Protocol): Result<Protocol, BuildError> => {
  if (stored === proposed) {
    return ok(stored);
  }
  const merged = COMBINED_PROTOCOLS[`${stored}+${proposed}`] ?? COMBINED_PROTOCOLS[`${proposed}+${stored}`];
  if (merged === undefined) {
    return err(
      configError(
        `invalid listeners on gateway, protocols ${stored} and ${proposed} cannot share the same port`,
      ),
    );
  }
  return ok(merged);
};

export const applyQUICUpgrade = (
  protocol: Protocol,
  port: number,
  quicEnabled: boolean | undefined,
): Result<Protocol, BuildError> => {
  if (quicEnabled !== true) {
    return ok(protocol);
  }
  switch (protocol) {
    case "UDP":
      return ok("QUIC");
    case "TCP_UDP":
      return ok("TCP_QUIC");
    default:
      return err(
        configError(`QUIC can only be enabled on UDP or TCP_UDP listeners, got ${protocol} on port ${port}`),
      );
  }
};

const routeHostnamesForPort = (route: RouteDescriptor, port: number): readonly string[] => {
  const compatible = route.getCompatibleHostnamesByPort().get(port);
  if (compatible !== undefined && compatible.length > 0) {
    return compatible;
  }
  return route.getHostnames();
};

export const mapGatewayListenerConfigsByPort = (
  gateway: Gateway,
  routesByPort: RoutesByPort,
): Result<Map<number, GatewayListenerConfig>, BuildError> => {
  const protocols = new Map<number, Protocol>();
  const hostnames = new Map<number, Set<string>>();

  for (const listener of gateway.spec.listeners) {
    const declared: Protocol =
      listener.protocol === "TLS" && listener.tls?.mode === "Passthrough" ? "TCP" : listener.protocol;
    const existing = protocols.get(listener.port);
    if (existing === undefined) {
      protocols.set(listener.port, declared);
    } else {
      const merged = mergeProtocols(existing, declared);
      if (merged.isErr()) {
        return err(merged.error);
      }
      protocols.set(listener.port, merged.value);
    }
    const set = hostnames.get(listener.port) ?? new Set<string>();
    if (listener.hostname !== undefined) {
      set.add(listener.hostname);
    }
    hostnames.set(listener.port, set);
  }

  const configs = new Map<number, GatewayListenerConfig>();
  for (const [port, protocol] of protocols) {
    const fromRoutes = new Set<string>();
    for (const route of routesByPort.get(port) ?? []) {
      for (const hostname of routeHostnamesForPort(route, port)) {
        fromRoutes.add(hostname);
      }
    }
    // Listener hostnames only stand in when no attached route names a host.
    const set = fromRoutes.size > 0 ? fromRoutes : (hostnames.get(port) ?? new Set<string>());
    configs.set(port, { protocol, hostnames: [...set] });
  }
  return ok(configs);
};

const parseProtocolPort = (protocolPort: string): number | undefined => {
  const raw = protocolPort.split(":")[1];
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
};

export const mapLoadBalancerListenerConfigsByPort = (
  lbConfig: LoadBalancerConfigurationSpec,
): Map<number, ListenerConfiguration> => {
  const configs = new Map<number, ListenerConfiguration>();
  for (const cfg of lbConfig.listenerConfigurations ?? []) {
    const port = parseProtocolPort(cfg.protocolPort);
    if (port !== undefined) {
      configs.set(port, cfg);
    }
  }
  return configs;
};

export const buildListenerALPNPolicy = (
  protocol: Protocol,
  lsConfig: ListenerConfiguration | undefined,
): Result<readonly string[] | undefined, BuildError> => {
  if (protocol !== "TLS") {
    return ok(undefined);
  }
  const raw = lsConfig?.alpnPolicy;
  if (raw === undefined) {
    return ok(["None"]);
  }
  const policy = ALPN_POLICIES.find((p) => p === raw);
  if (policy === undefined) {
    return err(
      configError(`invalid ALPN policy ${raw}, policy must be one of [${ALPN_POLICIES.join(", ")}]`),
    );
  }
  return ok([policy]);
};

const buildListenerAttributes = (lsConfig: ListenerConfiguration | undefined): readonly Attribute[] =>
  (lsConfig?.listenerAttributes ?? []).map(({ key, value }) => ({ key, value }));

const explicitCertificates = (lsConfig: ListenerConfiguration | undefined): Certificate[] => {
  const certs: Certificate[] = [];
  if (lsConfig?.defaultCertificate !== undefined) {
    certs.push({ certificateARN: lsConfig.defaultCertificate });
  }
  for (const arn of lsConfig?.certificates ?? []) {
    certs.push({ certificateARN: arn });
  }
  return certs;
};

const DEFAULT_L7_ACTIONS: readonly Action[] = [buildFixedResponseAction(404, "text/plain")];
const NO_BACKEND_ACTIONS: readonly Action[] = [buildFixedResponseAction(503, "text/plain")];

export type BuildListenersInput = {
  readonly stack: ModelStack;
  readonly gateway: Gateway;
  readonly lbConfig: LoadBalancerConfigurationSpec;
  readonly loadBalancerARN: StringToken;
  readonly ipAddressType: IPAddressType;
  readonly subnetIDs: readonly string[];
  readonly routesByPort: RoutesByPort;
};

export type BuildListenersOutput = {
  readonly secretKeys: readonly NamespacedName[];
};

export type ListenerBuilder = {
  buildListeners(input: BuildListenersInput): Promise<Result<BuildListenersOutput, BuildError>>;
};

export type ListenerBuilderOptions = {
  readonly loadBalancerType: LoadBalancerType;
  readonly defaultSSLPolicy: string;
  readonly tagHelper: TagHelper;
  readonly targetGroupBuilder: TargetGroupBuilder;
  readonly subnetsResolver: SubnetsResolver;
  readonly certDiscovery: CertDiscovery;
  readonly trustStoreResolver: TrustStoreResolver;
  readonly secretsManager: SecretsManager;
  readonly ruleSorter: RulePrecedenceSorter;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};

export const createListenerBuilder = (options: ListenerBuilderOptions): ListenerBuilder => {
  const { loadBalancerType, logger, signal } = options;

  const buildCertificates = async (
    gateway: Gateway,
    port: number,
    gwConfig: GatewayListenerConfig,
    lsConfig: ListenerConfiguration | undefined,
  ): Promise<Result<readonly Certificate[], BuildError>> => {
    if (!isSecureProtocol(gwConfig.protocol)) {
      return ok([]);
    }
    const explicit = explicitCertificates(lsConfig);
    if (explicit.length > 0) {
      return ok(explicit);
    }
    if (gwConfig.hostnames.length === 0) {
      return err(
        configError(
          `No hostnames found for TLS cert discovery for listener on gateway ${namespacedNameKey(gatewayNamespacedName(gateway))} with protocol:port ${gwConfig.protocol}:${port}`,
        ),
      );
    }
    const hostnames = [...new Set(gwConfig.hostnames)].sort();
    const discovered = await callCollaborator(
      `discover certificates for listener ${gwConfig.protocol}:${port}`,
      () => options.certDiscovery.discover(hostnames, signal),
      signal,
    );
    if (discovered.isErr()) {
      return err(discovered.error);
    }
    return ok(discovered.value.map((certificateARN) => ({ certificateARN })));
  };

  const buildMutualAuthentication = async (
    port: number,
    gwConfig: GatewayListenerConfig,
    lsConfig: ListenerConfiguration | undefined,
    subnetIDs: readonly string[],
  ): Promise<Result<MutualAuthenticationAttributes | undefined, BuildError>> => {
    if (!isSecureProtocol(gwConfig.protocol)) {
      return ok(undefined);
    }
    // All subnets of one load balancer share a zone type, so checking the first is enough.
    const firstSubnet = subnetIDs[0];
    if (firstSubnet !== undefined) {
      const restricted = await callCollaborator(
        `classify subnet ${firstSubnet}`,
        () => options.subnetsResolver.isSubnetInLocalZoneOrOutpost(firstSubnet, signal),
        signal,
      );
      if (restricted.isErr()) {
        return err(restricted.error);
      }
      if (restricted.value) {
        logger.debug("skipping mutual authentication in local zone or outpost", { port });
        return ok(undefined);
      }
    }

    const mtls = lsConfig?.mutualAuthentication;
    if (mtls === undefined) {
      return ok({ mode: "off" });
    }
    if (mtls.mode !== "verify") {
      return ok({
        mode: mtls.mode,
        ignoreClientCertificateExpiry: mtls.ignoreClientCertificateExpiry,
        advertiseTrustStoreCaNames: mtls.advertiseTrustStoreCaNames,
      });
    }

    const trustStore = mtls.trustStore;
    if (trustStore === undefined) {
      return err(configError(`trustStore is required for verify mode on listener port ${port}`));
    }
    let trustStoreARN = trustStore;
    if (!trustStore.startsWith("arn:")) {
      const resolved = await callCollaborator(
        `failed to resolve trustStore ARN for name ${trustStore}`,
        () => options.trustStoreResolver.getARNByName(trustStore, signal),
        signal,
      );
      if (resolved.isErr()) {
        return err(resolved.error);
      }
      trustStoreARN = resolved.value;
    }
    return ok({
      mode: "verify",
      trustStoreARN,
      ignoreClientCertificateExpiry: mtls.ignoreClientCertificateExpiry ?? false,
      advertiseTrustStoreCaNames: mtls.advertiseTrustStoreCaNames,
    });
  };

  type CommonListenerSpec = Omit<ListenerSpec, "defaultActions">;

  const buildCommonSpec = async (
    input: BuildListenersInput,
    port: number,
    gwConfig: GatewayListenerConfig,
    lsConfig: ListenerConfiguration | undefined,
  ): Promise<Result<CommonListenerSpec, BuildError>> => {
    const tags = options.tagHelper.resolve(input.lbConfig.tags);
    if (tags.isErr()) {
      return err(tags.error);
    }
    const certificates = await buildCertificates(input.gateway, port, gwConfig, lsConfig);
    if (certificates.isErr()) {
      return err(certificates.error);
    }
    const secure = isSecureProtocol(gwConfig.protocol);
    return ok({
      loadBalancerARN: input.loadBalancerARN,
      port,
      protocol: gwConfig.protocol,
      certificates: certificates.value,
      sslPolicy: secure ? (lsConfig?.sslPolicy ?? options.defaultSSLPolicy) : undefined,
      listenerAttributes: buildListenerAttributes(lsConfig),
      tags: tags.value,
    });
  };

  const buildL7ListenerSpec = async (
    input: BuildListenersInput,
    port: number,
    gwConfig: GatewayListenerConfig,
    lsConfig: ListenerConfiguration | undefined,
  ): Promise<Result<ListenerSpec | undefined, BuildError>> => {
    const common = await buildCommonSpec(input, port, gwConfig, lsConfig);
    if (common.isErr()) {
      return err(common.error);
    }
    const mutualAuthentication = await buildMutualAuthentication(
      port,
      gwConfig,
      lsConfig,
      input.subnetIDs,
    );
    if (mutualAuthentication.isErr()) {
      return err(mutualAuthentication.error);
    }
    return ok({
      ...common.value,
      defaultActions: DEFAULT_L7_ACTIONS,
      mutualAuthentication: mutualAuthentication.value,
    });
  };

  // Returns undefined when the listener is skipped.
  const buildL4ListenerSpec = async (
    input: BuildListenersInput,
    port: number,
    gwConfig: GatewayListenerConfig,
    lsConfig: ListenerConfiguration | undefined,
    routes: readonly RouteDescriptor[],
  ): Promise<Result<ListenerSpec | undefined, BuildError>> => {
    const gwKey = namespacedNameKey(gatewayNamespacedName(input.gateway));
    const common = await buildCommonSpec(input, port, gwConfig, lsConfig);
    if (common.isErr()) {
      return err(common.error);
    }
    const alpnPolicy = buildListenerALPNPolicy(gwConfig.protocol, lsConfig);
    if (alpnPolicy.isErr()) {
      return err(alpnPolicy.error);
    }

    if (routes.length > 1) {
      const names = routes.map((r) => namespacedNameKey(r.getRouteNamespacedName())).join(", ");
      return err(
        configError(
          `multiple routes [${names}] are not supported for listener ${gwConfig.protocol}:${port} for gateway ${gwKey}`,
        ),
      );
    }
    const route = routes[0];
    if (route === undefined) {
      return ok(undefined);
    }
    const routeKey = namespacedNameKey(route.getRouteNamespacedName());
    const backends = route.getAttachedRules()[0]?.getBackends() ?? [];
    const backend = backends[0];
    if (backend === undefined) {
      logger.info("skipping listener creation, route has no backend", {
        route: routeKey,
        listener: `${gwConfig.protocol}:${port}`,
        gateway: gwKey,
      });
      return ok(undefined);
    }
    if (backends.length > 1) {
      return err(
        configError(
          `multiple backend refs found for route ${routeKey} for listener on port:protocol ${port}:${gwConfig.protocol} for gateway ${gwKey}, only one must be specified`,
        ),
      );
    }
    if (backend.weight === 0) {
      logger.info("ignoring network load balancer backend with 0 weight", { route: routeKey });
      return ok(undefined);
    }

    const tg = await options.targetGroupBuilder.buildTargetGroup({
      stack: input.stack,
      gateway: input.gateway,
      listenerPort: port,
      lbIPType: input.ipAddressType,
      route,
      backend,
    });
    if (tg.isErr()) {
      return err(tg.error);
    }
    return ok({
      ...common.value,
      alpnPolicy: alpnPolicy.value,
      defaultActions: [
        { type: "forward", forwardConfig: { targetGroups: [{ targetGroupARN: tg.value }] } },
      ],
    });
  };

  const buildRuleActions = async (
    input: BuildListenersInput,
    port: number,
    protocol: Protocol,
    route: RouteDescriptor,
    rule: RouteRule,
    secretKeys: NamespacedName[],
  ): Promise<Result<readonly Action[], BuildError>> => {
    const actions: Action[] = [];

    const preRouting = getPreRoutingAction(rule.getListenerRuleConfig());
    if (preRouting !== undefined) {
      if (isSecureProtocol(protocol)) {
        const built = await buildPreRoutingAction(preRouting, route, options.secretsManager, signal);
        if (built.isErr()) {
          return err(built.error);
        }
        actions.push(built.value.action);
        if (built.value.secretKey !== undefined) {
          secretKeys.push(built.value.secretKey);
        }
      } else {
        logger.info("ignoring pre-routing action on non-secure listener", {
          action: preRouting.type,
          listener: `${protocol}:${port}`,
        });
      }
    }

    const tuples: TargetGroupTuple[] = [];
    if (needsTargetGroups(rule)) {
      for (const backend of rule.getBackends()) {
        const tg = await options.targetGroupBuilder.buildTargetGroup({
          stack: input.stack,
          gateway: input.gateway,
          listenerPort: port,
          lbIPType: input.ipAddressType,
          route,
          backend,
        });
        if (tg.isErr()) {
          return err(tg.error);
        }
        tuples.push({ targetGroupARN: tg.value, weight: backend.weight });
      }
    }

    const routing = buildRoutingAction(rule, tuples);
    if (routing.isErr()) {
      return err(routing.error);
    }
    if (routing.value === undefined) {
      logger.debug("filling in rule without backends with fixed 503", {
        route: namespacedNameKey(route.getRouteNamespacedName()),
      });
      actions.push(...NO_BACKEND_ACTIONS);
    } else {
      actions.push(routing.value);
    }
    return ok(actions);
  };

  const buildListenerRules = async (
    input: BuildListenersInput,
    port: number,
    protocol: Protocol,
    lsARN: StringToken,
    secretKeys: NamespacedName[],
  ): Promise<Result<void, BuildError>> => {
    const sorted = options.ruleSorter(input.routesByPort.get(port) ?? []);
    let priority = 1;
    for (const { route, rule } of sorted) {
      const actions = await buildRuleActions(input, port, protocol, route, rule, secretKeys);
      if (actions.isErr()) {
        return err(actions.error);
      }
      const tags = options.tagHelper.resolve(rule.getListenerRuleConfig()?.tags ?? input.lbConfig.tags);
      if (tags.isErr()) {
        return err(tags.error);
      }
      const listenerRule: ListenerRule = {
        resourceType: LISTENER_RULE,
        id: `${port}:${priority}`,
        spec: {
          listenerARN: lsARN,
          priority,
          conditions: rule.getConditions(),
          actions: actions.value,
          tags: tags.value,
        },
      };
      const added = input.stack.add(listenerRule);
      if (added.isErr()) {
        return err(added.error);
      }
      priority += 1;
    }
    return ok(undefined);
  };

  return {
    buildListeners: async (input) => {
      const secretKeys: NamespacedName[] = [];
      const gwConfigs = mapGatewayListenerConfigsByPort(input.gateway, input.routesByPort);
      if (gwConfigs.isErr()) {
        return err(gwConfigs.error);
      }
      const lsConfigs = mapLoadBalancerListenerConfigsByPort(input.lbConfig);
      const ports = [...gwConfigs.value.keys()]
        .filter((port) => (input.routesByPort.get(port) ?? []).length > 0)
        .sort((a, b) => a - b);

      for (const port of ports) {
        const declared = gwConfigs.value.get(port);
        if (declared === undefined) {
          continue;
        }
        const lsConfig = lsConfigs.get(port);
        const protocol = applyQUICUpgrade(declared.protocol, port, lsConfig?.quicEnabled);
        if (protocol.isErr()) {
          return err(protocol.error);
        }
        const gwConfig: GatewayListenerConfig = { ...declared, protocol: protocol.value };

        const spec =
          loadBalancerType === "application"
            ? await buildL7ListenerSpec(input, port, gwConfig, lsConfig)
            : await buildL4ListenerSpec(
                input,
                port,
                gwConfig,
                lsConfig,
                input.routesByPort.get(port) ?? [],
              );
        if (spec.isErr()) {
          return err(spec.error);
        }
        if (spec.value === undefined) {
          continue;
        }

        const listener: Listener = { resourceType: LISTENER, id: String(port), spec: spec.value };
        const added = input.stack.add(listener);
        if (added.isErr()) {
          return err(added.error);
        }

        if (loadBalancerType === "application") {
          const rules = await buildListenerRules(
            input,
            port,
            gwConfig.protocol,
            listenerARN(listener.id),
            secretKeys,
          );
          if (rules.isErr()) {
            return err(rules.error);
          }
        }
      }
      return ok({ secretKeys });
    },
  };
};
