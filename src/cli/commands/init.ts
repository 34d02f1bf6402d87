import path from "node:path"
import type {Command} from "commander"
import {Project} from "../../vcs/index.js"
import {action, createRuntime, selectProject} from "../runtime.js"
import {colors, formatBytes, info, success, symbols} from "../ui.js"

type InitOptions = {
    force?: boolean
}

export function registerInitCommand(program: Command): void {
    program
        .command("init <file>")
        .description("Start tracking a project file and store its first version")
        .option("-f, --force", "Replace an existing project record for this file (drops its version history)")
        .action(action(async (file: string, options: InitOptions, command: Command) => {
            const runtime = createRuntime(command)
            console.log(info(`Initializing project (${runtime.backend.kind} storage)...`))

            const project = await Project.initialize(path.resolve(file), runtime.backend, {
                extensions: runtime.config.projectExtensions,
                force: options.force,
            })
            await selectProject(runtime, project)

            const first = project.versions[0]
            console.log("")
            console.log(success(`Initialized ${project.projectName}`))
            if (first) {
                console.log(`${symbols.success} Project file: ${formatBytes(first.size)}`)
                console.log(`${symbols.success} Assets tracked: ${first.assetCount} files`)
                if (first.totalSize > 0) {
                    console.log(`${symbols.success} Total size: ${formatBytes(first.totalSize)}`)
                }
            }
            console.log(`${symbols.success} Storage: ${project.backend.kind} ${colors.muted(project.backend.volume)}`)
            console.log("")
            console.log(info(`Use 'aevc commit "message"' to save a new version`))
        }))
}
