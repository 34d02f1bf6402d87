export * from "./types.js"
export * from "./extractor.js"
export * from "./coordinator.js"
export * from "./tracking.js"
export * from "./project-store.js"
export * from "./context.js"
export * from "./project.js"
