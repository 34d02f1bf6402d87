export * from "./errors.js"
export * from "./logger.js"
export * from "./config.js"
export * from "./storage/index.js"
export * from "./vcs/index.js"
export * from "./api/index.js"
