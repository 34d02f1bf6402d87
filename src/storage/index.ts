export * from "./types.js"
export * from "./file.js"
export * from "./local-backend.js"
export * from "./docker-backend.js"
