export * from "./types";
export * from "./errors";
export * from "./interfaces";
export * from "./cache";
export * from "./cache-factory";
export * from "./placeholders";
export * from "./localizer";
export * from "./implementations/lru-translation-cache";
export * from "./implementations/persistent-translation-cache";
export * from "./implementations/memory-key-value-store";
export * from "./implementations/caching-translator";
export * from "./implementations/stub-translator";
export * from "./implementations/google-translate-api-key-translator";
export * from "./implementations/on-device-translator";
export * from "./utils/language";
export { simpleHash } from "./utils/hash";
export { withRetry } from "./utils/withRetry";
export type { RetryOptions } from "./utils/withRetry";
