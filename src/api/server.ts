import {serve, type ServerType} from "@hono/node-server"
import {createRoutes, ApiOptions} from "./routes.js"

export type ServerConfig = ApiOptions & {
    port?: number
    host?: string
}

export interface Server {
    start(): Promise<void>
    stop(): Promise<void>
    readonly port: number
}

/**
 * Read-only HTTP API over the stored projects.
 */
export function createServer(config: ServerConfig): Server {
    const {port = 8080, host = "localhost", ...apiOptions} = config
    const app = createRoutes(apiOptions)

    let httpServer: ServerType | null = null
    let actualPort = port

    return {
        async start() {
            return new Promise(resolve => {
                httpServer = serve({fetch: app.fetch, port, hostname: host}, info => {
                    actualPort = info.port
                    resolve()
                })
            })
        },

        async stop() {
            return new Promise((resolve, reject) => {
                if (!httpServer) {
                    resolve()
                    return
                }
                httpServer.close(err => {
                    httpServer = null
                    if (err) reject(err)
                    else resolve()
                })
            })
        },

        get port() {
            return actualPort
        },
    }
}
