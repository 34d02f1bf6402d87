import type {Command} from "commander"
import {errorMessage} from "../../errors.js"
import {action, createRuntime, resolveProject} from "../runtime.js"
import {colors, formatBytes, formatDate, formatVersionNumber, symbols, warning} from "../ui.js"
import {parseVersionNumber} from "./shared.js"

export function registerShowCommand(program: Command): void {
    program
        .command("show <version>")
        .description("Show one version with its assets")
        .action(action(async (raw: string, _options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)
            const version = project.getVersion(parseVersionNumber(raw))

            console.log(colors.emphasis(`${project.projectName} ${formatVersionNumber(version.number)}`))
            console.log(`  Message:      ${version.message}`)
            console.log(`  Date:         ${formatDate(version.timestamp)}`)
            console.log(`  Project file: ${formatBytes(version.size)} ${colors.muted(version.storageKey)}`)
            console.log(`  Assets:       ${version.assetCount} files, ${formatBytes(version.totalSize)}`)
            for (const asset of version.assets) {
                console.log(`    ${symbols.bullet} ${asset.filename} (${asset.extension || "no extension"})  ${formatBytes(asset.size)}`)
            }

            try {
                const tracking = await project.loadTracking(version.number)
                console.log(
                    `  Changes:      ${tracking.newAssets} new, ${tracking.presentAssets - tracking.newAssets} kept, ` +
                    `${tracking.removedAssets} removed`
                )
            } catch (err) {
                console.log(warning(`Asset tracking unavailable: ${errorMessage(err)}`))
            }
        }))
}
