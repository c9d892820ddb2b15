import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { BuildError } from "./errors.js";

export type StringToken = LiteralToken | RefToken;

export type LiteralToken = {
  readonly kind: "literal";
  readonly value: string;
};

/**
 * A reference to an attribute of another resource in the same stack, known only after deployment.
 */
export type RefToken = {
  readonly kind: "ref";
  readonly resourceType: string;
  readonly resourceId: string;
  readonly attribute: string;
};

// Tokens are recognized by identity, so a plain object shaped like a token stays plain data.
const issuedTokens = new WeakSet<object>();

const issue = <T extends StringToken>(token: T): T => {
  issuedTokens.add(token);
  return token;
};

export const literal = (value: string): LiteralToken =>
  issue<LiteralToken>(Object.freeze({ kind: "literal", value }));

export const ref = (resourceType: string, resourceId: string, attribute: string): RefToken =>
  issue<RefToken>(Object.freeze({ kind: "ref", resourceType, resourceId, attribute }));

export function isStringToken(value: unknown): value is StringToken {
  return typeof value === "object" && value !== null && issuedTokens.has(value);
}

export function asToken(value: unknown): StringToken | null {
  return isStringToken(value) ? value : null;
}

export function tokensEqual(a: StringToken, b: StringToken): boolean {
  if (a.kind === "literal" && b.kind === "literal") {
    return a.value === b.value;
  }
  if (a.kind === "ref" && b.kind === "ref") {
    return (
      a.resourceType === b.resourceType &&
      a.resourceId === b.resourceId &&
      a.attribute === b.attribute
    );
  }
  return false;
}

export function tokenToString(token: StringToken): string {
  switch (token.kind) {
    case "literal":
      return token.value;
    case "ref":
      return `\${${token.resourceType}/${token.resourceId}.${token.attribute}}`;
  }
}

export type TokenLookup = (token: RefToken) => string | undefined;

export function resolveStringToken(
  token: StringToken,
  lookup: TokenLookup,
): Result<string, BuildError> {
  if (token.kind === "literal") {
    return ok(token.value);
  }
  const value = lookup(token);
  if (value === undefined) {
    const reference = tokenToString(token);
    return err({
      kind: "unresolved_token",
      reference,
      message: `unresolved reference ${reference}`,
    });
  }
  return ok(value);
}

/**
 * Walks a plain value and replaces every embedded token with its rendered string form.
 */
export function renderTokens(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  const token = asToken(value);
  if (token !== null) {
    return tokenToString(token);
  }

  if (Array.isArray(value)) {
    return value.map(renderTokens);
  }

  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of value) {
      result[String(key)] = renderTokens(val);
    }
    return result;
  }

  if (typeof value === "object") {
    const obj = z.record(z.string(), z.unknown()).safeParse(value);
    if (obj.success) {
      const result: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(obj.data)) {
        if (val === undefined) continue;
        result[key] = renderTokens(val);
      }
      return result;
    }
  }

  return value;
}
