import fs from "fs"
import path from "node:path"
import {Command, Option} from "commander"
import {registerInitCommand} from "./commands/init.js"
import {registerCommitCommand} from "./commands/commit.js"
import {registerListCommands} from "./commands/list.js"
import {registerShowCommand} from "./commands/show.js"
import {registerHistoryCommands} from "./commands/history.js"
import {registerProjectCommands} from "./commands/project.js"
import {registerServeCommand} from "./commands/serve.js"

function readVersion(): string {
    // Two levels up from both src/cli and dist/cli
    const packageJson: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, "..", "..", "package.json"), "utf8"))
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson && typeof packageJson.version === "string") {
        return packageJson.version
    }
    return "0.0.0"
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name("aevc")
        .description("Version control for After Effects projects and the assets they reference")
        .version(readVersion())
        .addOption(new Option("--backend <kind>", "Storage backend").choices(["local", "docker"]))
        .option("--project <file>", "Project file or project record to use instead of the selected project")

    registerInitCommand(program)
    registerCommitCommand(program)
    registerListCommands(program)
    registerShowCommand(program)
    registerHistoryCommands(program)
    registerProjectCommands(program)
    registerServeCommand(program)

    return program
}
