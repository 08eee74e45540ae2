export * from "./envelope.ts";
export * from "./errors.ts";
export * from "./expiration.ts";
export * from "./resolver.ts";
export * from "./stamp-record.ts";
export * from "./types.ts";
export * from "./wallet.ts";
