import readline from "node:readline/promises"
import type {Command} from "commander"
import {Project} from "../../vcs/index.js"
import {action, createRuntime, resolveProject, selectProject, toConfigPath} from "../runtime.js"
import {colors, failure, info, success, warning} from "../ui.js"

type DeleteOptions = {
    yes?: boolean
}

async function confirm(question: string): Promise<string> {
    const rl = readline.createInterface({input: process.stdin, output: process.stdout})
    try {
        return (await rl.question(question)).trim()
    } finally {
        rl.close()
    }
}

export function registerProjectCommands(program: Command): void {
    program
        .command("select <file>")
        .description("Select the project to work on, by project file or project record")
        .action(action(async (target: string, _options: object, command: Command) => {
            const runtime = createRuntime(command)
            const project = await Project.fromFile(toConfigPath(target), runtime.backend)
            await selectProject(runtime, project)
            console.log(success(`Selected ${project.projectName} (${project.versions.length} versions)`))
        }))

    program
        .command("delete")
        .description("Delete the selected project with every stored version and asset")
        .option("-y, --yes", "Do not ask for confirmation")
        .action(action(async (options: DeleteOptions, command: Command) => {
            const runtime = createRuntime(command)
            const project = await resolveProject(runtime, command)

            console.log(`${colors.info("Project:")} ${project.projectName}`)
            console.log(`${colors.info("Storage:")} ${project.backend.kind} ${project.projectId}`)
            if (!options.yes) {
                console.log(warning("This permanently deletes all project data"))
                const answer = await confirm(info("Type 'DELETE' to confirm: "))
                if (answer !== "DELETE") {
                    console.log(failure("Deletion cancelled"))
                    process.exitCode = 1
                    return
                }
            }

            await project.delete()
            const context = await runtime.contexts.load()
            if (context && context.configPath === project.configPath) {
                await runtime.contexts.clear()
            }
            console.log(success("Project deleted"))
        }))
}
