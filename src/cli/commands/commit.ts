import path from "node:path"
import type {Command} from "commander"
import {action, createRuntime, resolveProject} from "../runtime.js"
import {formatBytes, formatVersionNumber, success, symbols} from "../ui.js"

export function registerCommitCommand(program: Command): void {
    program
        .command("commit <message> [file]")
        .description("Save a new version of the selected project")
        .action(action(async (message: string, file: string | undefined, _options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)
            const version = await project.commit(message, file ? path.resolve(file) : project.projectPath)

            console.log(success(`Committed ${formatVersionNumber(version.number)}: ${version.message}`))
            console.log(`${symbols.success} Project file: ${formatBytes(version.size)}`)
            console.log(`${symbols.success} Assets: ${version.assetCount} files, ${formatBytes(version.totalSize)}`)
        }))
}
