import type {Command} from "commander"
import {InvalidArgumentError} from "commander"
import {createServer} from "../../api/index.js"
import {action, createRuntime, toConfigPath} from "../runtime.js"
import {info} from "../ui.js"

type ServeOptions = {
    port?: number
    host: string
}

function parsePort(raw: string): number {
    const port = Number(raw)
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidArgumentError(`Invalid port '${raw}'`)
    }
    return port
}

export function registerServeCommand(program: Command): void {
    program
        .command("serve")
        .description("Start the read-only HTTP API")
        .option("--port <port>", "Port to listen on", parsePort)
        .option("--host <host>", "Address to bind", "localhost")
        .action(action(async (options: ServeOptions, command: Command) => {
            const runtime = createRuntime(command)
            const explicit: string | undefined = command.optsWithGlobals<{ project?: string }>().project

            const server = createServer({
                backend: runtime.backend,
                port: options.port ?? runtime.config.port,
                host: options.host,
                configPaths: async () => {
                    const paths = explicit ? [toConfigPath(explicit)] : []
                    const context = await runtime.contexts.load()
                    if (context && !paths.includes(context.configPath)) {
                        paths.push(context.configPath)
                    }
                    return paths
                },
            })
            await server.start()

            console.log(info(`API listening on http://${options.host}:${server.port}`))
            console.log("  GET /api/projects")
            console.log("  GET /api/projects/:id/commits")
            console.log("  GET /api/projects/:id/commits/:number")
            console.log("  GET /health")

            const shutdown = () => {
                server.stop().then(
                    () => process.exit(0),
                    err => {
                        console.error(err)
                        process.exit(1)
                    }
                )
            }
            process.once("SIGINT", shutdown)
            process.once("SIGTERM", shutdown)
        }))
}
