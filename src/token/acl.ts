import { TokenError } from "../errors/error.js";
import type { AclClaim, PathData, PathEntry, PathOptions } from "./types.js";

function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (typeof x !== "object" || x === null || Array.isArray(x)) return false;
  const proto = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

function invalid(message: string, details?: unknown) {
  return new TokenError("TOKEN_INVALID_INPUT", message, details);
}

function ensurePath(path: unknown): string {
  if (typeof path !== "string" || path.length === 0) {
    throw invalid("ACL path must be a non-empty string", { path });
  }
  return path;
}

function cloneOptions(path: string, options: PathOptions): PathOptions {
  try {
    return structuredClone(options);
  } catch (e) {
    throw invalid(`Options for ACL path "${path}" cannot be copied`, {
      path,
      cause: e instanceof Error ? e.message : String(e),
    });
  }
}

/**
 * Deep-copies path options into a fresh object. Empty options still yield
 * `{}`, so every ACL entry serializes as an object.
 */
export function toPathOptions(path: string, options: unknown): PathOptions {
  if (!isPlainObject(options)) {
    throw invalid(`Options for ACL path "${path}" must be an object`, {
      path,
    });
  }

  const { methods, ...rest } = options;
  if (methods === undefined) return cloneOptions(path, rest);

  if (!Array.isArray(methods) || !methods.every((m) => typeof m === "string")) {
    throw invalid(`methods for ACL path "${path}" must be a list of strings`, {
      path,
      methods,
    });
  }
  return cloneOptions(path, { ...rest, methods: [...methods] });
}

/**
 * Decodes `setPaths` input into tagged entries. Everything is validated
 * before anything is returned.
 */
export function decodePathData(data: PathData): PathEntry[] {
  const items: ReadonlyArray<unknown> = Array.isArray(data) ? data : [data];
  const entries: PathEntry[] = [];

  for (const item of items) {
    if (typeof item === "string") {
      entries.push({ kind: "bare", path: ensurePath(item) });
      continue;
    }

    if (!isPlainObject(item)) {
      throw invalid("ACL path entry must be a path or a path-to-options map", {
        entry: item,
      });
    }

    for (const [key, value] of Object.entries(item)) {
      const path = ensurePath(key);
      entries.push({
        kind: "withOptions",
        path,
        options: toPathOptions(path, value),
      });
    }
  }

  return entries;
}

export function entryOptions(entry: PathEntry): PathOptions {
  return entry.kind === "bare" ? {} : entry.options;
}

export function serializeAcl(paths: ReadonlyMap<string, PathOptions>): AclClaim {
  return {
    paths: Object.fromEntries(
      Array.from(paths, ([path, options]) => [
        path,
        structuredClone(options),
      ]),
    ),
  };
}
