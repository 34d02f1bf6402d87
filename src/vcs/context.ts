import fs from "fs"
import path from "node:path"
import {z} from "zod"
import {errorMessage, hasErrorCode, ProjectLoadError} from "../errors.js"
import {ProjectContext} from "./types.js"

export const CONTEXT_FILE = "current_project.json"

const ProjectContextSchema = z.object({
    projectName: z.string(),
    configPath: z.string(),
}) satisfies z.ZodType<ProjectContext>

/**
 * Remembers which project the user selected last, in a small JSON file under
 * the tool's home directory.
 */
export class ContextStore {
    readonly filePath: string

    constructor(homeDir: string) {
        this.filePath = path.join(homeDir, CONTEXT_FILE)
    }

    async load(): Promise<ProjectContext | undefined> {
        let raw: string
        try {
            raw = await fs.promises.readFile(this.filePath, "utf8")
        } catch (err) {
            if (hasErrorCode(err, "ENOENT")) {
                return undefined
            }
            throw new ProjectLoadError(this.filePath, errorMessage(err), {cause: err})
        }

        let data: unknown
        try {
            data = JSON.parse(raw)
        } catch (err) {
            throw new ProjectLoadError(this.filePath, `not valid JSON: ${errorMessage(err)}`, {cause: err})
        }
        const parsed = ProjectContextSchema.safeParse(data)
        if (!parsed.success) {
            throw new ProjectLoadError(this.filePath, "invalid project context")
        }
        return parsed.data
    }

    async save(context: ProjectContext): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.filePath), {recursive: true})
        await fs.promises.writeFile(this.filePath, JSON.stringify(context, null, 2))
    }

    async clear(): Promise<void> {
        await fs.promises.rm(this.filePath, {force: true})
    }
}
