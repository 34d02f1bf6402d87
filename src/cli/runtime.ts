import path from "node:path"
import type {Command} from "commander"
import {AppConfig, createBackend, loadConfig} from "../config.js"
import {errorMessage, NoProjectSelectedError} from "../errors.js"
import {logger} from "../logger.js"
import {IStorageBackend} from "../storage/index.js"
import {CONFIG_FILE, ContextStore, getConfigPath, Project} from "../vcs/index.js"
import {failure} from "./ui.js"

export type GlobalOptions = {
    backend?: "local" | "docker"
    project?: string
}

export type Runtime = {
    config: AppConfig
    backend: IStorageBackend
    contexts: ContextStore
}

export function createRuntime(command: Command): Runtime {
    const options: GlobalOptions = command.optsWithGlobals()
    const config = loadConfig()
    if (options.backend) {
        config.backend = options.backend
    }
    logger.level = config.logLevel
    return {
        config,
        backend: createBackend(config),
        contexts: new ContextStore(config.homeDir),
    }
}

/**
 * Path of a project record from either a project file or the record itself.
 */
export function toConfigPath(target: string): string {
    const resolved = path.resolve(target)
    return path.basename(resolved) === CONFIG_FILE ? resolved : getConfigPath(resolved)
}

/**
 * The project named by --project, or else the selected one.
 */
export async function resolveProject(runtime: Runtime, command: Command): Promise<Project> {
    const options: GlobalOptions = command.optsWithGlobals()
    if (options.project) {
        return await Project.fromFile(toConfigPath(options.project), runtime.backend)
    }
    const context = await runtime.contexts.load()
    if (!context) {
        throw new NoProjectSelectedError()
    }
    return await Project.fromFile(context.configPath, runtime.backend)
}

export async function selectProject(runtime: Runtime, project: Project): Promise<void> {
    await runtime.contexts.save({projectName: project.projectName, configPath: project.configPath})
}

/**
 * Wraps a command action so that any error ends the process with a message
 * and exit code 1.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await fn(...args)
        } catch (err) {
            const message = errorMessage(err)
            console.error(failure(message))
            if (err instanceof NoProjectSelectedError) {
                console.error("  Use 'aevc init <file>' or 'aevc select <file>' first")
            }
            process.exitCode = 1
        }
    }
}
