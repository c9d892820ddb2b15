import { createHash } from "node:crypto";

const NAME_PREFIX = "k8s";
const NAMESPACE_LEN = 8;
const NAME_LEN = 8;
const HASH_LEN = 10;

export const removeNonAlphanumeric = (s: string): string => s.replace(/[^A-Za-z0-9]/g, "");

// Parts are fed to the digest back to back, without separators.
export const sha256Hex = (parts: readonly string[]): string => {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest("hex");
};

/**
 * Builds a `k8s-<namespace>-<name>-<hash>` resource name from the first characters of each
 * sanitized component and of the hex digest.
 */
export const hashedResourceName = (namespace: string, name: string, digest: string): string =>
  [
    NAME_PREFIX,
    removeNonAlphanumeric(namespace).slice(0, NAMESPACE_LEN),
    removeNonAlphanumeric(name).slice(0, NAME_LEN),
    digest.slice(0, HASH_LEN),
  ].join("-");
