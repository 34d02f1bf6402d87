import path from "node:path"
import type {Command} from "commander"
import {Project, sanitizeProjectName, summarizeVersion} from "../../vcs/index.js"
import {action, createRuntime, resolveProject} from "../runtime.js"
import {colors, formatBytes, formatDate, formatVersionNumber, info, symbols} from "../ui.js"

export function registerListCommands(program: Command): void {
    program
        .command("list")
        .description("List the projects stored in the backend")
        .action(action(async (_options: object, command: Command) => {
            const runtime = createRuntime(command)
            const projects = await Project.listProjects(runtime.backend)
            if (projects.length === 0) {
                console.log(info("No projects stored yet. Use 'aevc init <file>' to create one."))
                return
            }

            const selected = await runtime.contexts.load()
            const selectedId = selected ? sanitizeProjectName(path.parse(selected.projectName).name) : undefined
            projects.forEach((p, i) => {
                const marker = p.name === selectedId ? colors.success(" (selected)") : ""
                console.log(`  ${colors.muted(`${i + 1}.`)} ${p.name}${marker} ${colors.muted(p.namespace)}`)
            })
        }))

    program
        .command("log")
        .description("List the versions of the selected project")
        .action(action(async (_options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)

            console.log(colors.emphasis(project.projectName))
            for (const v of project.versions.map(summarizeVersion)) {
                console.log(
                    `  ${symbols.bullet} ${formatVersionNumber(v.number)}  ${colors.muted(formatDate(v.timestamp))}  ` +
                    `${v.message}  ${colors.muted(`${v.assetCount} assets, ${formatBytes(v.totalSize)}`)}`
                )
            }
        }))
}
