import os from "node:os"
import path from "node:path"
import {z} from "zod"
import {AevcError} from "./errors.js"
import {LogLevel} from "./logger.js"
import {
    DEFAULT_CONTAINER,
    DEFAULT_STORAGE_PATH,
    DEFAULT_VOLUME,
    DockerBackend,
    IStorageBackend,
    LocalBackend,
} from "./storage/index.js"
import {DEFAULT_PROJECT_EXTENSIONS} from "./vcs/index.js"

export type AppConfig = {
    homeDir: string
    backend: "local" | "docker"
    storageRoot: string
    dockerContainer: string
    dockerVolume: string
    dockerStoragePath: string
    projectExtensions: string[]
    logLevel: LogLevel
    port: number
}

export class ConfigError extends AevcError {
    constructor(reason: string) {
        super(`Invalid configuration: ${reason}`)
    }
}

const EnvSchema = z.object({
    AEVC_HOME: z.string().min(1).optional(),
    AEVC_BACKEND: z.enum(["local", "docker"]).default("local"),
    AEVC_STORAGE_ROOT: z.string().min(1).optional(),
    AEVC_DOCKER_CONTAINER: z.string().min(1).default(DEFAULT_CONTAINER),
    AEVC_DOCKER_VOLUME: z.string().min(1).default(DEFAULT_VOLUME),
    AEVC_DOCKER_STORAGE_PATH: z.string().startsWith("/").default(DEFAULT_STORAGE_PATH),
    AEVC_PROJECT_EXTENSIONS: z.string().optional(),
    AEVC_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    AEVC_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
})

function parseExtensions(value: string | undefined): string[] {
    if (value === undefined) return [...DEFAULT_PROJECT_EXTENSIONS]
    const extensions = value
        .split(",")
        .map(ext => ext.trim().toLowerCase())
        .filter(ext => ext.length > 0)
        .map(ext => ext.startsWith(".") ? ext : `.${ext}`)
    return extensions.length > 0 ? extensions : [...DEFAULT_PROJECT_EXTENSIONS]
}

/**
 * Reads the configuration from environment variables. Everything has a
 * default; the tool keeps its state under `~/.aevc` unless AEVC_HOME says
 * otherwise.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        throw new ConfigError(issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue")
    }
    const vars = parsed.data
    const homeDir = path.resolve(vars.AEVC_HOME ?? path.join(os.homedir(), ".aevc"))

    return {
        homeDir,
        backend: vars.AEVC_BACKEND,
        storageRoot: path.resolve(vars.AEVC_STORAGE_ROOT ?? path.join(homeDir, "storage")),
        dockerContainer: vars.AEVC_DOCKER_CONTAINER,
        dockerVolume: vars.AEVC_DOCKER_VOLUME,
        dockerStoragePath: vars.AEVC_DOCKER_STORAGE_PATH,
        projectExtensions: parseExtensions(vars.AEVC_PROJECT_EXTENSIONS),
        logLevel: vars.AEVC_LOG_LEVEL,
        port: vars.AEVC_PORT,
    }
}

export function createBackend(config: AppConfig): IStorageBackend {
    if (config.backend === "docker") {
        return new DockerBackend({
            container: config.dockerContainer,
            volume: config.dockerVolume,
            storagePath: config.dockerStoragePath,
        })
    }
    return new LocalBackend(config.storageRoot)
}
