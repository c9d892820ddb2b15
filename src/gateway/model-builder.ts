import { err, ok, type Result } from "neverthrow";
import { configError, type BuildError } from "../core/errors.js";
import { noopLogger, type Logger } from "../core/logger.js";
import type { StringToken } from "../core/tokens.js";
import type { ControllerConfig } from "../config/index.js";
import {
  LOAD_BALANCER,
  loadBalancerARN,
  newModelStack,
  type LoadBalancer,
  type LoadBalancerType,
  type ModelStack,
} from "../model/index.js";
import type { Collaborators } from "./collaborators.js";
import {
  emptyLoadBalancerConfiguration,
  namespacedNameKey,
  type Gateway,
  type LoadBalancerConfiguration,
  type NamespacedName,
} from "./inputs.js";
import { createListenerBuilder } from "./listener.js";
import {
  LOAD_BALANCER_RESOURCE_ID,
  buildLoadBalancerIPAddressType,
  buildLoadBalancerScheme,
  buildLoadBalancerSpec,
  isDeleteProtected,
} from "./load-balancer.js";
import { declarationOrderSorter, type RoutesByPort, type RulePrecedenceSorter } from "./routes.js";
import { createSecurityGroupBuilder, type SecurityGroupOutput } from "./security-group.js";
import { createSubnetModelBuilder } from "./subnet/builder.js";
import { createTagHelper, stackTrackingTags } from "./tags.js";
import { createTargetGroupBuilder, type FrontendNlbTarget } from "./target-group.js";
import { createTargetGroupBindingNetworkBuilder } from "./tgb-network.js";

export type ModelBuildInput = {
  readonly gateway: Gateway;
  readonly lbConfig?: LoadBalancerConfiguration;
  readonly routesByPort: RoutesByPort;
  // Aborting cancels the remaining collaborator lookups of this build.
  readonly signal?: AbortSignal;
};

export type ModelBuildOutput = {
  readonly stack: ModelStack;
  readonly loadBalancer?: LoadBalancer;
  readonly backendSecurityGroupAllocated: boolean;
  readonly secretKeys: readonly NamespacedName[];
  readonly targetGroupNameToArn: ReadonlyMap<string, StringToken>;
  readonly frontendNlbTargets: readonly FrontendNlbTarget[];
};

export type ModelBuilder = {
  build(input: ModelBuildInput): Promise<Result<ModelBuildOutput, BuildError>>;
};

export type ModelBuilderOptions = {
  readonly config: ControllerConfig;
  readonly loadBalancerType: LoadBalancerType;
  readonly collaborators: Collaborators;
  readonly ruleSorter?: RulePrecedenceSorter;
  readonly logger?: Logger;
};

const gatewayKey = (gateway: Gateway): NamespacedName => ({
  namespace: gateway.metadata.namespace,
  name: gateway.metadata.name,
});

/**
 * Compiles one Gateway, its load balancer configuration and its attached routes into a Stack
 * of desired resources. Each `build` call works on its own Stack and target group cache.
 */
export const createModelBuilder = (options: ModelBuilderOptions): ModelBuilder => {
  const { config, loadBalancerType, collaborators } = options;
  const logger = options.logger ?? noopLogger;
  const ruleSorter = options.ruleSorter ?? declarationOrderSorter;
  const tagHelper = createTagHelper(
    config.defaultTags,
    config.tagPrecedence,
    config.externalManagedTags,
  );
  const subnetBuilder = createSubnetModelBuilder(
    loadBalancerType,
    collaborators.subnetsResolver,
    collaborators.loadBalancerLister,
  );
  const securityGroupBuilder = createSecurityGroupBuilder({
    clusterName: config.clusterName,
    enableBackendSG: config.enableBackendSG,
    sgResolver: collaborators.securityGroupResolver,
    backendSGProvider: collaborators.backendSGProvider,
    logger,
  });
  const securityGroupsDisabled =
    loadBalancerType === "network" && !config.featureGates.nlbSecurityGroup;

  return {
    build: async (input) => {
      const { gateway, routesByPort, signal } = input;
      const lbConfig = (input.lbConfig ?? emptyLoadBalancerConfiguration()).spec;
      const gwKey = gatewayKey(gateway);
      const stack = newModelStack(gwKey);

      if (gateway.metadata.deletionTimestamp !== undefined) {
        if (isDeleteProtected(lbConfig, logger)) {
          return err(
            configError(
              `Unable to delete gateway ${namespacedNameKey(gwKey)} because deletion protection is enabled.`,
            ),
          );
        }
        logger.info("gateway is being deleted, emitting empty stack", {
          gateway: namespacedNameKey(gwKey),
        });
        return ok({
          stack,
          backendSecurityGroupAllocated: false,
          secretKeys: [],
          targetGroupNameToArn: new Map(),
          frontendNlbTargets: [],
        });
      }

      const scheme = buildLoadBalancerScheme(lbConfig, config.defaultLoadBalancerScheme);
      if (scheme.isErr()) {
        return err(scheme.error);
      }
      const ipAddressType = buildLoadBalancerIPAddressType(lbConfig, "ipv4");
      if (ipAddressType.isErr()) {
        return err(ipAddressType.error);
      }
      const tags = tagHelper.resolve(lbConfig.tags);
      if (tags.isErr()) {
        return err(tags.error);
      }

      const subnets = await subnetBuilder.build({
        subnetConfigs: lbConfig.loadBalancerSubnets,
        subnetTagSelector: lbConfig.loadBalancerSubnetsSelector,
        scheme: scheme.value,
        ipAddressType: ipAddressType.value,
        stackTags: stackTrackingTags(config.clusterName, gwKey),
        signal,
      });
      if (subnets.isErr()) {
        return err(subnets.error);
      }

      let securityGroups: SecurityGroupOutput;
      if (securityGroupsDisabled) {
        logger.debug("network load balancer security groups disabled by feature gate");
        securityGroups = { securityGroupTokens: [], backendSecurityGroupAllocated: false };
      } else {
        const built = await securityGroupBuilder.build({
          stack,
          gateway,
          lbConfig,
          routes: routesByPort,
          ipAddressType: ipAddressType.value,
          tags: tags.value,
          signal,
        });
        if (built.isErr()) {
          return err(built.error);
        }
        securityGroups = built.value;
      }

      const loadBalancer: LoadBalancer = {
        resourceType: LOAD_BALANCER,
        id: LOAD_BALANCER_RESOURCE_ID,
        spec: buildLoadBalancerSpec({
          clusterName: config.clusterName,
          loadBalancerType,
          gateway,
          lbConfig,
          scheme: scheme.value,
          ipAddressType: ipAddressType.value,
          subnetMappings: subnets.value.subnetMappings,
          securityGroups: securityGroups.securityGroupTokens,
          tags: tags.value,
        }),
      };
      const added = stack.add(loadBalancer);
      if (added.isErr()) {
        return err(added.error);
      }

      const tgbNetworkBuilder = createTargetGroupBindingNetworkBuilder({
        disableRestrictedSGRules: config.disableRestrictedSGRules,
        vpcID: config.vpcID,
        lbScheme: scheme.value,
        lbSourceRanges: lbConfig.sourceRanges,
        sgOutput: securityGroups,
        loadBalancerSubnets: subnets.value.subnets,
        vpcInfoProvider: collaborators.vpcInfoProvider,
        signal,
      });
      const targetGroupBuilder = createTargetGroupBuilder({
        clusterName: config.clusterName,
        vpcID: config.vpcID,
        loadBalancerType,
        defaultTargetType: config.defaultTargetType,
        tagHelper,
        tgbNetworkBuilder,
        targetGroupARNMapper: collaborators.targetGroupARNMapper,
        logger,
        signal,
      });
      const listenerBuilder = createListenerBuilder({
        loadBalancerType,
        defaultSSLPolicy: config.defaultSSLPolicy,
        tagHelper,
        targetGroupBuilder,
        subnetsResolver: collaborators.subnetsResolver,
        certDiscovery: collaborators.certDiscovery,
        trustStoreResolver: collaborators.trustStoreResolver,
        secretsManager: collaborators.secretsManager,
        ruleSorter,
        logger,
        signal,
      });

      const listeners = await listenerBuilder.buildListeners({
        stack,
        gateway,
        lbConfig,
        loadBalancerARN: loadBalancerARN(loadBalancer.id),
        ipAddressType: ipAddressType.value,
        subnetIDs: subnets.value.subnetMappings.map((m) => m.subnetID),
        routesByPort,
      });
      if (listeners.isErr()) {
        return err(listeners.error);
      }

      logger.info("built model", {
        gateway: namespacedNameKey(gwKey),
        resources: stack.size,
      });
      return ok({
        stack,
        loadBalancer,
        backendSecurityGroupAllocated: securityGroups.backendSecurityGroupAllocated,
        secretKeys: listeners.value.secretKeys,
        targetGroupNameToArn: targetGroupBuilder.targetGroupNameToARN(),
        frontendNlbTargets: targetGroupBuilder.frontendNlbTargets(),
      });
    },
  };
};
