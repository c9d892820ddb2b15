import { ResultAsync } from "neverthrow";

export type BuildError =
  | { readonly kind: "config"; readonly message: string }
  | {
      readonly kind: "collaborator";
      readonly operation: string;
      readonly message: string;
      readonly cause: unknown;
    }
  | {
      readonly kind: "duplicate_resource";
      readonly message: string;
      readonly resourceType: string;
      readonly resourceId: string;
    }
  | { readonly kind: "unresolved_token"; readonly message: string; readonly reference: string };

export const configError = (message: string): BuildError => ({ kind: "config", message });

const causeMessage = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
};

export const collaboratorError = (operation: string, cause: unknown): BuildError => ({
  kind: "collaborator",
  operation,
  message: `${operation}: ${causeMessage(cause)}`,
  cause,
});

/**
 * Runs an injected collaborator call and captures both rejections and synchronous throws
 * as a `collaborator` error tagged with the operation being performed. An aborted `signal`
 * fails the call with the abort reason before the collaborator is invoked.
 */
export const callCollaborator = <T>(
  operation: string,
  fn: () => Promise<T>,
  signal?: AbortSignal,
): ResultAsync<T, BuildError> =>
  ResultAsync.fromThrowable(
    async () => {
      signal?.throwIfAborted();
      return fn();
    },
    (cause) => collaboratorError(operation, cause),
  )();

export const formatBuildError = (error: BuildError): string => {
  switch (error.kind) {
    case "config":
      return `invalid configuration: ${error.message}`;
    case "collaborator":
      return error.message;
    case "duplicate_resource":
      return error.message;
    case "unresolved_token":
      return error.message;
  }
};
