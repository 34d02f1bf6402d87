import fs from "fs"
import path from "node:path"
import {z} from "zod"
import {File} from "../storage/index.js"
import {PersistenceError, ProjectLoadError, errorMessage} from "../errors.js"
import {AssetReference, ProjectDump, Version} from "./types.js"

export const PROJECT_DIR = ".aevc"
export const CONFIG_FILE = "config.json"

const AssetReferenceSchema = z.object({
    originalPath: z.string(),
    relativePath: z.string(),
    filename: z.string(),
    extension: z.string(),
    size: z.number().nonnegative(),
    storageKey: z.string(),
}) satisfies z.ZodType<AssetReference>

const VersionSchema = z.object({
    number: z.number().int().nonnegative(),
    message: z.string(),
    timestamp: z.string(),
    size: z.number().nonnegative(),
    storageKey: z.string(),
    assets: z.array(AssetReferenceSchema),
    assetCount: z.number().int().nonnegative(),
    totalSize: z.number().nonnegative(),
}) satisfies z.ZodType<Version>

export const ProjectDumpSchema = z.object({
    projectName: z.string().min(1),
    projectPath: z.string().min(1),
    projectId: z.string().min(1),
    createdAt: z.string(),
    backend: z.enum(["local", "docker"]),
    volume: z.string(),
    versions: z.array(VersionSchema).min(1),
}) satisfies z.ZodType<ProjectDump>

export function getProjectDir(projectFilePath: string): string {
    return path.join(path.dirname(path.resolve(projectFilePath)), PROJECT_DIR)
}

export function getConfigPath(projectFilePath: string): string {
    return path.join(getProjectDir(projectFilePath), CONFIG_FILE)
}

export async function isInitialized(projectFilePath: string): Promise<boolean> {
    return await new File(getConfigPath(projectFilePath)).isFile()
}

export function parseProjectDump(data: unknown, configPath: string): ProjectDump {
    const parsed = ProjectDumpSchema.safeParse(data)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
        throw new ProjectLoadError(configPath, `invalid record${where}: ${issue?.message ?? "unknown issue"}`)
    }
    return parsed.data
}

export async function readProjectDump(configPath: string): Promise<ProjectDump> {
    let raw: string
    try {
        raw = await fs.promises.readFile(configPath, "utf8")
    } catch (err) {
        throw new ProjectLoadError(configPath, errorMessage(err), {cause: err})
    }

    let data: unknown
    try {
        data = JSON.parse(raw)
    } catch (err) {
        throw new ProjectLoadError(configPath, `not valid JSON: ${errorMessage(err)}`, {cause: err})
    }

    return parseProjectDump(data, configPath)
}

// Rewrites the whole record through a sibling temp file and a rename.
export async function writeProjectDump(configPath: string, dump: ProjectDump): Promise<void> {
    const tmpPath = `${configPath}.tmp`
    try {
        await fs.promises.mkdir(path.dirname(configPath), {recursive: true})
        await fs.promises.writeFile(tmpPath, JSON.stringify(dump, null, 2))
        await fs.promises.rename(tmpPath, configPath)
    } catch (err) {
        throw new PersistenceError(configPath, errorMessage(err), {cause: err})
    }
}
