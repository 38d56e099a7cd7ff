export type TokenErrorCode =
  | "TOKEN_INVALID_JTI"
  | "TOKEN_NOT_CONFIGURED"
  | "TOKEN_SIGNING_FAILED"
  | "TOKEN_INVALID_INPUT";
