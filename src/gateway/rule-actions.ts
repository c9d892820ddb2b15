import { err, ok, type Result } from "neverthrow";
import { callCollaborator, configError, type BuildError } from "../core/errors.js";
import type { Action, TargetGroupTuple } from "../model/elbv2.js";
import type { SecretsManager } from "./collaborators.js";
import {
  namespacedNameKey,
  type ListenerRuleConfiguration,
  type NamespacedName,
  type RuleActionConfig,
} from "./inputs.js";
import type { RequestRedirectFilter, RouteDescriptor, RouteRule } from "./routes.js";

export const OIDC_SECRET_KEY_CLIENT_ID = "clientID";
export const OIDC_SECRET_KEY_CLIENT_ID_LEGACY = "clientId";
export const OIDC_SECRET_KEY_CLIENT_SECRET = "clientSecret";

export const DEFAULT_REDIRECT_STATUS_CODE = 302;

type PreRoutingActionConfig = Extract<
  RuleActionConfig,
  { type: "authenticate-oidc" | "authenticate-cognito" }
>;
type RoutingActionConfig = Extract<RuleActionConfig, { type: "forward" | "redirect" | "fixed-response" }>;
type ForwardActionConfig = Extract<RuleActionConfig, { type: "forward" }>;
type RedirectActionConfig = Extract<RuleActionConfig, { type: "redirect" }>;

const isPreRoutingAction = (action: RuleActionConfig): action is PreRoutingActionConfig =>
  action.type === "authenticate-oidc" || action.type === "authenticate-cognito";

const isRoutingAction = (action: RuleActionConfig): action is RoutingActionConfig =>
  action.type === "forward" || action.type === "redirect" || action.type === "fixed-response";

export const getPreRoutingAction = (
  config: ListenerRuleConfiguration | undefined,
): PreRoutingActionConfig | undefined => config?.actions?.find(isPreRoutingAction);

export const getRoutingAction = (
  config: ListenerRuleConfiguration | undefined,
): RoutingActionConfig | undefined => config?.actions?.find(isRoutingAction);

export type PreRoutingActionOutput = {
  readonly action: Action;
  readonly secretKey?: NamespacedName;
};

const trimEndWhitespace = (value: string): string => value.replace(/\s+$/u, "");
const trimEndControl = (value: string): string => value.replace(/[\u0000-\u001f\u007f-\u009f]+$/u, "");

const buildAuthenticateOIDCAction = async (
  config: Extract<PreRoutingActionConfig, { type: "authenticate-oidc" }>["authenticateOIDCConfig"],
  route: RouteDescriptor,
  secretsManager: SecretsManager,
  signal: AbortSignal | undefined,
): Promise<Result<PreRoutingActionOutput, BuildError>> => {
  const secretKey: NamespacedName = {
    namespace: route.getRouteNamespacedName().namespace,
    name: config.secret.name,
  };
  const data = await callCollaborator(
    `read secret ${namespacedNameKey(secretKey)}`,
    () => secretsManager.getSecretData(secretKey, signal),
    signal,
  );
  if (data.isErr()) {
    return err(data.error);
  }
  const rawClientID =
    data.value[OIDC_SECRET_KEY_CLIENT_ID] ?? data.value[OIDC_SECRET_KEY_CLIENT_ID_LEGACY];
  if (rawClientID === undefined) {
    return err(configError(`missing clientID, secret: ${namespacedNameKey(secretKey)}`));
  }
  const rawClientSecret = data.value[OIDC_SECRET_KEY_CLIENT_SECRET];
  if (rawClientSecret === undefined) {
    return err(configError(`missing clientSecret, secret: ${namespacedNameKey(secretKey)}`));
  }

  return ok({
    action: {
      type: "authenticate-oidc",
      authenticateOIDCConfig: {
        issuer: config.issuer,
        authorizationEndpoint: config.authorizationEndpoint,
        tokenEndpoint: config.tokenEndpoint,
        userInfoEndpoint: config.userInfoEndpoint,
        clientID: trimEndWhitespace(rawClientID),
        clientSecret: trimEndControl(rawClientSecret),
        scope: config.scope,
        sessionCookieName: config.sessionCookieName,
        sessionTimeout: config.sessionTimeout,
        authenticationRequestExtraParams: config.authenticationRequestExtraParams,
        onUnauthenticatedRequest: config.onUnauthenticatedRequest,
        useExistingClientSecret: config.useExistingClientSecret,
      },
    },
    secretKey,
  });
};

/**
 * Builds the authentication action that runs before routing. OIDC client credentials are
 * read from a Secret in the route's namespace; the secret's key is returned so callers can
 * track which Secrets the compiled model depends on.
 */
export const buildPreRoutingAction = async (
  config: PreRoutingActionConfig,
  route: RouteDescriptor,
  secretsManager: SecretsManager,
  signal?: AbortSignal,
): Promise<Result<PreRoutingActionOutput, BuildError>> => {
  switch (config.type) {
    case "authenticate-oidc":
      return buildAuthenticateOIDCAction(config.authenticateOIDCConfig, route, secretsManager, signal);
    case "authenticate-cognito": {
      const cognito = config.authenticateCognitoConfig;
      return ok({
        action: {
          type: "authenticate-cognito",
          authenticateCognitoConfig: {
            userPoolARN: cognito.userPoolArn,
            userPoolClientID: cognito.userPoolClientId,
            userPoolDomain: cognito.userPoolDomain,
            scope: cognito.scope,
            sessionCookieName: cognito.sessionCookieName,
            sessionTimeout: cognito.sessionTimeout,
            authenticationRequestExtraParams: cognito.authenticationRequestExtraParams,
            onUnauthenticatedRequest: cognito.onUnauthenticatedRequest,
          },
        },
      });
    }
  }
};

export const buildFixedResponseAction = (statusCode: number, contentType?: string, messageBody?: string): Action => ({
  type: "fixed-response",
  fixedResponseConfig: { statusCode: String(statusCode), contentType, messageBody },
});

const shouldProvisionForward = (tuples: readonly TargetGroupTuple[]): boolean =>
  tuples.some((tuple) => tuple.weight === undefined || tuple.weight !== 0);

export const buildForwardAction = (
  tuples: readonly TargetGroupTuple[],
  config: ForwardActionConfig | undefined,
): Action | undefined => {
  if (!shouldProvisionForward(tuples)) {
    return undefined;
  }
  const stickiness = config?.forwardConfig?.targetGroupStickinessConfig;
  return {
    type: "forward",
    forwardConfig:
      stickiness === undefined
        ? { targetGroups: tuples }
        : {
            targetGroups: tuples,
            targetGroupStickinessConfig: {
              enabled: stickiness.enabled,
              durationSeconds: stickiness.durationSeconds,
            },
          },
  };
};

const hasWildcard = (value: string): boolean => value.includes("*") || value.includes("?");

export const buildRedirectAction = (
  filter: RequestRedirectFilter,
  config: RedirectActionConfig | undefined,
): Result<Action, BuildError> => {
  let componentSpecified = false;

  let protocol: string | undefined;
  if (filter.scheme !== undefined) {
    const upper = filter.scheme.toUpperCase();
    if (upper !== "HTTP" && upper !== "HTTPS") {
      return err(configError(`unsupported redirect scheme: ${upper}`));
    }
    protocol = upper;
    componentSpecified = true;
  }

  let port: string | undefined;
  if (filter.port !== undefined) {
    port = String(filter.port);
    componentSpecified = true;
  }

  let path: string | undefined;
  if (filter.path !== undefined) {
    switch (filter.path.type) {
      case "ReplaceFullPath":
        if (hasWildcard(filter.path.replaceFullPath)) {
          return err(
            configError(`ReplaceFullPath shouldn't contain wildcards: ${filter.path.replaceFullPath}`),
          );
        }
        path = filter.path.replaceFullPath;
        break;
      case "ReplacePrefixMatch":
        if (hasWildcard(filter.path.replacePrefixMatch)) {
          return err(
            configError(`ReplacePrefixMatch shouldn't contain wildcards: ${filter.path.replacePrefixMatch}`),
          );
        }
        path = `${filter.path.replacePrefixMatch}/*`;
        break;
    }
    componentSpecified = true;
  }

  if (filter.hostname !== undefined) {
    componentSpecified = true;
  }

  if (!componentSpecified) {
    return err(
      configError(
        "To avoid a redirect loop, you must modify at least one of the following components: protocol, port, hostname or path.",
      ),
    );
  }

  return ok({
    type: "redirect",
    redirectConfig: {
      protocol,
      port,
      host: filter.hostname,
      path,
      query: config?.redirectConfig?.query,
      statusCode: `HTTP_${filter.statusCode ?? DEFAULT_REDIRECT_STATUS_CODE}`,
    },
  });
};

// A rule whose backends are never forwarded to does not need target groups.
export const needsTargetGroups = (rule: RouteRule): boolean => {
  if (rule.getRedirect() !== undefined) {
    return false;
  }
  return getRoutingAction(rule.getListenerRuleConfig())?.type !== "fixed-response";
};

/**
 * Picks the routing action for a rule: an explicit fixed response wins, then a request
 * redirect, then a forward to the rule's target groups. Returns undefined when none applies.
 */
export const buildRoutingAction = (
  rule: RouteRule,
  tuples: readonly TargetGroupTuple[],
): Result<Action | undefined, BuildError> => {
  const routing = getRoutingAction(rule.getListenerRuleConfig());
  if (routing?.type === "fixed-response") {
    const fixed = routing.fixedResponseConfig;
    return ok(buildFixedResponseAction(fixed.statusCode, fixed.contentType, fixed.messageBody));
  }

  const redirect = rule.getRedirect();
  if (redirect !== undefined) {
    return buildRedirectAction(redirect, routing?.type === "redirect" ? routing : undefined);
  }
  if (routing?.type === "redirect") {
    return err(
      configError("a request redirect filter must be provided when a redirect action is configured"),
    );
  }

  return ok(buildForwardAction(tuples, routing?.type === "forward" ? routing : undefined));
};
