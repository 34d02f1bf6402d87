import type {Command} from "commander"
import {action, createRuntime, resolveProject} from "../runtime.js"
import {formatVersionNumber, info, success} from "../ui.js"
import {parseVersionNumber} from "./shared.js"

export function registerHistoryCommands(program: Command): void {
    program
        .command("remove <version>")
        .description(
            "Remove one version from the history. Other versions keep their numbers, " +
            "so versions numbered at or above the new version count can no longer be shown or pulled"
        )
        .action(action(async (raw: string, _options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)
            const number = parseVersionNumber(raw)
            await project.removeVersion(number)
            console.log(success(`Removed ${formatVersionNumber(number)}`))
        }))

    program
        .command("prune")
        .description("Remove versions whose stored project file is missing from storage")
        .action(action(async (_options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)
            const removed = await project.pruneMissingVersions()
            if (removed === 0) {
                console.log(success("Nothing to prune, all versions are present in storage"))
            } else {
                console.log(success(`Pruned ${removed} missing version(s)`))
            }
        }))

    program
        .command("pull <version> [dir]")
        .description("Copy a stored version back to disk")
        .action(action(async (raw: string, dir: string | undefined, _options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)
            const number = parseVersionNumber(raw)

            console.log(info(`Pulling ${formatVersionNumber(number)}...`))
            const result = await project.restoreVersion(number, dir ?? ".")

            console.log(success(`Pulled ${formatVersionNumber(number)}`))
            console.log(`  Project file: ${result.projectFile}`)
            if (result.restoredAssets.length > 0) {
                console.log(`  Restored assets: ${result.restoredAssets.length}`)
                if (result.relinked) {
                    console.log("  Project file updated to reference the restored assets")
                }
            }
        }))
}
