export { ok, err, Result } from "neverthrow";

export type { StringToken, LiteralToken, RefToken, TokenLookup } from "./core/tokens.js";
export {
  literal,
  ref,
  isStringToken,
  tokensEqual,
  tokenToString,
  resolveStringToken,
  renderTokens,
} from "./core/tokens.js";
export type { Resource, StackID } from "./core/stack.js";
export { Stack } from "./core/stack.js";
export type { BuildError } from "./core/errors.js";
export { configError, collaboratorError, formatBuildError } from "./core/errors.js";
export type { Logger, LogLevel, LogFields } from "./core/logger.js";
export { createConsoleLogger, noopLogger } from "./core/logger.js";

export * from "./model/index.js";

export type { ControllerConfig, FeatureGates, ConfigError } from "./config/index.js";
export {
  ControllerConfigSchema,
  parseControllerConfig,
  readControllerConfig,
  validateControllerConfig,
} from "./config/index.js";

export * from "./gateway/inputs.js";
export * from "./gateway/routes.js";
export type * from "./gateway/collaborators.js";
export type { TagPrecedence, TagHelper } from "./gateway/tags.js";
export { resolveTags, createTagHelper, stackTrackingTags } from "./gateway/tags.js";
export type { SubnetMutator } from "./gateway/subnet/mutators.js";
export { networkLoadBalancerMutators } from "./gateway/subnet/mutators.js";
export type { SubnetBuildInput, SubnetBuildOutput, SubnetModelBuilder } from "./gateway/subnet/builder.js";
export { createSubnetModelBuilder, validateSubnetsInput } from "./gateway/subnet/builder.js";
export type { SecurityGroupOutput, SecurityGroupBuilder } from "./gateway/security-group.js";
export { createSecurityGroupBuilder } from "./gateway/security-group.js";
export type { TargetGroupBindingNetworkBuilder } from "./gateway/tgb-network.js";
export { createTargetGroupBindingNetworkBuilder } from "./gateway/tgb-network.js";
export type { TargetGroupBuilder, FrontendNlbTarget } from "./gateway/target-group.js";
export { createTargetGroupBuilder } from "./gateway/target-group.js";
export type { ListenerBuilder } from "./gateway/listener.js";
export { createListenerBuilder, mergeProtocols } from "./gateway/listener.js";
export type {
  ModelBuilder,
  ModelBuilderOptions,
  ModelBuildInput,
  ModelBuildOutput,
} from "./gateway/model-builder.js";
export { createModelBuilder } from "./gateway/model-builder.js";
