export { TokenGenerator, DEFAULT_TTL_SECONDS } from "./token/tokenGenerator.js";

export * from "./errors/codes.js";
export * from "./errors/error.js";

export * from "./token/types.js";
export { isUuidV4, createJti } from "./token/jti.js";
export { decodePathData } from "./token/acl.js";

export { createLogger } from "./logger.js";
export type { LogLevel, LoggerOptions, TokenLogger } from "./logger.js";
