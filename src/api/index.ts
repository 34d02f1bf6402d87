export * from "./routes.js"
export * from "./server.js"
