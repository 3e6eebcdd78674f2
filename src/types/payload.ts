import type { LosslessNumber } from "lossless-json";

/**
 * Numbers keep their source text so integers beyond 2^53 survive re-encoding.
 * Plain numbers only appear when a body had to be decoded with JSON.parse.
 */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Decoded request body. Only `query` is ever read or rewritten; every other
 * field is forwarded as decoded.
 */
export type GraphQLPayload = { [key: string]: JsonValue };
