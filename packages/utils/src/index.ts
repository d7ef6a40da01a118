export * from "./core/brand.js"
export * from "./core/cached-property.js"
export * from "./core/chunks.js"
export * from "./core/deprecation.js"
export * from "./core/errors.js"
export * from "./core/images.js"
export * from "./core/json.js"
export * from "./core/markdown.js"
export * from "./core/platform.js"
export * from "./core/ratelimit.js"
export * from "./core/search.js"
export * from "./core/sequence-proxy.js"
export * from "./core/snowflake-list.js"
export * from "./core/snowflake.js"
export * from "./core/time.js"
export * from "./shell/config.js"
export * from "./shell/deprecation.js"
export * from "./shell/tasks.js"
export * from "./shell/time.js"
