import type { TokenLogger } from "../logger.js";

/** Restrictions attached to one ACL path. Unknown keys are passed through. */
export type PathOptions = {
  methods?: string[];
  [key: string]: unknown;
};

export type PathEntry =
  | { kind: "bare"; path: string }
  | { kind: "withOptions"; path: string; options: PathOptions };

export type PathMap = Record<string, PathOptions>;

/**
 * Input accepted by `setPaths`:
 * - `["/a/**", "/b/**"]`: bare paths, granted with no options
 * - `["/a/**", { "/b/**": { methods: ["GET"] } }]`: bare and keyed entries mixed
 * - `{ "/b/**": { methods: ["GET"] } }`: keyed entries only
 */
export type PathData = ReadonlyArray<string | PathMap> | PathMap;

export type AclClaim = {
  paths: PathMap;
};

/** Epoch seconds, or a Date floored to the second. */
export type NotBefore = number | Date;

/** Returns the current time in epoch seconds. */
export type Clock = () => number;

export type PrivateKeyInput = string | Uint8Array;

export type TokenGeneratorOptions = {
  clock?: Clock;
  jtiFactory?: () => string;
  logger?: TokenLogger;
};

export type FactoryOptions = {
  ttl?: number;
  jti?: string;
  paths?: PathData;
  not_before?: NotBefore;
  sub?: string;
  subject?: string;
  [claim: string]: unknown;
};

export type TokenClaims = {
  iat: number;
  exp: number;
  jti: string;
  application_id: string;
  acl?: AclClaim;
  nbf?: number;
  sub?: string;
  [claim: string]: unknown;
};
