import { SignJWT } from "jose";
import { createPrivateKey, type KeyObject } from "node:crypto";
import {
  InvalidJtiError,
  NotConfiguredError,
  SigningError,
  TokenError,
} from "../errors/error.js";
import { createLogger, type TokenLogger } from "../logger.js";
import {
  decodePathData,
  entryOptions,
  serializeAcl,
  toPathOptions,
} from "./acl.js";
import { createJti, isUuidV4 } from "./jti.js";
import type {
  Clock,
  FactoryOptions,
  NotBefore,
  PathData,
  PathMap,
  PathOptions,
  PrivateKeyInput,
  TokenClaims,
  TokenGeneratorOptions,
} from "./types.js";

export const DEFAULT_TTL_SECONDS = 900;

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

function toEpochSeconds(value: NotBefore): number {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new TokenError("TOKEN_INVALID_INPUT", "Not Before date is invalid");
    }
    return Math.floor(ms / 1000);
  }
  if (!Number.isInteger(value)) {
    throw new TokenError(
      "TOKEN_INVALID_INPUT",
      "Not Before must be an integer number of epoch seconds",
      { value },
    );
  }
  return value;
}

/**
 * Assembles the claims for an application JWT and signs it with RS256.
 *
 * One instance targets one application id and key. `generate()` may be called
 * repeatedly: `iat`/`exp` are re-read from the clock each time, the `jti` is
 * generated once and reused.
 */
export class TokenGenerator {
  readonly applicationId: string;

  private privateKey: PrivateKeyInput;
  private clock: Clock;
  private jtiFactory: () => string;
  private logger: TokenLogger;

  // parsed on first generate()
  private signingKey?: KeyObject;

  private ttl = DEFAULT_TTL_SECONDS;
  private jti?: string;
  private nbf?: number;
  private subject?: string;
  private paths = new Map<string, PathOptions>();
  private claims = new Map<string, unknown>();

  constructor(
    applicationId: string,
    privateKey: PrivateKeyInput,
    options: TokenGeneratorOptions = {},
  ) {
    if (
      typeof applicationId !== "string" ||
      applicationId.trim().length === 0
    ) {
      throw new TokenError(
        "TOKEN_INVALID_INPUT",
        "applicationId must be a non-empty string",
      );
    }

    this.applicationId = applicationId;
    this.privateKey = privateKey;
    this.clock = options.clock ?? systemClock;
    this.jtiFactory = options.jtiFactory ?? createJti;
    this.logger = (options.logger ?? createLogger()).child({
      applicationId,
    });
  }

  /**
   * Builds and signs a token in one call. `ttl`, `jti`, `paths`,
   * `not_before` and `sub`/`subject` configure the generator; every other
   * key becomes a custom claim.
   */
  static async factory(
    applicationId: string,
    privateKey: PrivateKeyInput,
    options: FactoryOptions = {},
    generatorOptions?: TokenGeneratorOptions,
  ): Promise<string> {
    const generator = new TokenGenerator(
      applicationId,
      privateKey,
      generatorOptions,
    );
    const { ttl, jti, paths, not_before, sub, subject, ...claims } = options;

    if (ttl !== undefined) generator.setTTL(ttl);
    if (jti !== undefined) generator.setJTI(jti);
    if (paths !== undefined) generator.setPaths(paths);
    if (not_before !== undefined) generator.setNotBefore(not_before);
    if (subject !== undefined) generator.setSubject(subject);
    if (sub !== undefined) generator.setSubject(sub);

    for (const [name, value] of Object.entries(claims)) {
      generator.addClaim(name, value);
    }

    return generator.generate();
  }

  setTTL(seconds: number): this {
    if (!Number.isInteger(seconds)) {
      throw new TokenError("TOKEN_INVALID_INPUT", "TTL must be an integer", {
        seconds,
      });
    }
    this.ttl = seconds;
    return this;
  }

  getTTL(): number {
    return this.ttl;
  }

  setJTI(uuid: string): this {
    if (!isUuidV4(uuid)) throw new InvalidJtiError(uuid);
    this.jti = uuid;
    return this;
  }

  getJTI(): string {
    if (this.jti === undefined) {
      const jti = this.jtiFactory();
      if (!isUuidV4(jti)) throw new InvalidJtiError(jti);
      this.jti = jti;
    }
    return this.jti;
  }

  setNotBefore(timestamp: NotBefore): this {
    this.nbf = toEpochSeconds(timestamp);
    return this;
  }

  hasNotBefore(): boolean {
    return this.nbf !== undefined;
  }

  getNotBefore(): number {
    if (this.nbf === undefined) throw new NotConfiguredError("Not Before time");
    return this.nbf;
  }

  setSubject(subject: string): this {
    if (typeof subject !== "string") {
      throw new TokenError("TOKEN_INVALID_INPUT", "Subject must be a string");
    }
    this.subject = subject;
    return this;
  }

  hasSubject(): boolean {
    return this.subject !== undefined;
  }

  getSubject(): string {
    if (this.subject === undefined) throw new NotConfiguredError("Subject");
    return this.subject;
  }

  addPath(path: string, options: PathOptions = {}): this {
    if (typeof path !== "string" || path.length === 0) {
      throw new TokenError(
        "TOKEN_INVALID_INPUT",
        "ACL path must be a non-empty string",
        { path },
      );
    }
    this.paths.set(path, toPathOptions(path, options));
    return this;
  }

  /**
   * Replaces every ACL path. Invalid input leaves the current paths as they
   * were.
   */
  setPaths(pathData: PathData): this {
    const entries = decodePathData(pathData);

    this.paths = new Map();
    for (const entry of entries) {
      this.paths.set(entry.path, entryOptions(entry));
    }
    return this;
  }

  getPaths(): PathMap {
    return serializeAcl(this.paths).paths;
  }

  /**
   * No reserved names: a custom claim overrides any standard claim. The value
   * must be JSON-serializable.
   */
  addClaim(name: string, value: unknown): this {
    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (e) {
      throw new TokenError(
        "TOKEN_INVALID_INPUT",
        `Claim "${name}" cannot be serialized to JSON`,
        { claim: name, cause: e instanceof Error ? e.message : String(e) },
      );
    }
    if (json === undefined) {
      throw new TokenError(
        "TOKEN_INVALID_INPUT",
        `Claim "${name}" has no JSON representation`,
        { claim: name },
      );
    }
    this.claims.set(name, value);
    return this;
  }

  getClaims(): Record<string, unknown> {
    return Object.fromEntries(this.claims);
  }

  async generate(): Promise<string> {
    const iat = this.clock();
    const exp = iat + this.ttl;

    const standard: TokenClaims = {
      iat,
      exp,
      jti: this.getJTI(),
      application_id: this.applicationId,
    };

    if (this.paths.size > 0) standard.acl = serializeAcl(this.paths);
    if (this.nbf !== undefined) standard.nbf = this.nbf;
    if (this.subject !== undefined) standard.sub = this.subject;

    const payload = Object.fromEntries([
      ...Object.entries(standard),
      ...this.claims,
    ]);

    let token: string;
    try {
      token = await new SignJWT(payload)
        .setProtectedHeader({ alg: "RS256", typ: "JWT" })
        .sign(this.getSigningKey());
    } catch (e) {
      const error = new SigningError(e);
      this.logger.error("token signing failed", { cause: error.message });
      throw error;
    }

    this.logger.debug("token issued", { jti: standard.jti, exp });
    return token;
  }

  private getSigningKey(): KeyObject {
    if (!this.signingKey) {
      this.signingKey = createPrivateKey(
        typeof this.privateKey === "string"
          ? this.privateKey
          : Buffer.from(this.privateKey),
      );
    }
    return this.signingKey;
  }
}
