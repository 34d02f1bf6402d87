import fs from "fs"
import path from "node:path"
import {File, IStorageBackend} from "../storage/index.js"
import {
    AlreadyInitializedError,
    FileNotFoundError,
    InvalidExtensionError,
    LastVersionError,
    NotInitializedError,
    RestoreConflictError,
    VersionNotFoundError,
    errorMessage,
} from "../errors.js"
import {Logger, logger as defaultLogger} from "../logger.js"
import {extractAssets} from "./extractor.js"
import {AssetCoordinator, sharedAssetsNamespace} from "./coordinator.js"
import {createTracking, loadTracking, saveTracking} from "./tracking.js"
import {getConfigPath, getProjectDir, isInitialized, readProjectDump, writeProjectDump} from "./project-store.js"
import {AssetReference, AssetTracking, ProjectDump, ProjectInfo, RestoreResult, Version} from "./types.js"

export const INITIAL_MESSAGE = "Initial version"
export const DEFAULT_PROJECT_EXTENSIONS = [".aepx"]
export const RESTORED_ASSETS_DIR = "assets"

export type ProjectOptions = {
    logger?: Logger
}

export type InitializeOptions = ProjectOptions & {
    extensions?: string[]
    force?: boolean // Replace an existing local project record
}

export type VersionSummary = Pick<Version, "number" | "message" | "timestamp" | "size" | "assetCount" | "totalSize">

/**
 * Namespace name for a project, derived from its file name without extension.
 */
export function sanitizeProjectName(name: string): string {
    let id = name
    for (const token of [" ", "/", "\\", "..", ":", "*", "?", "\"", "<", ">", "|"]) {
        id = id.split(token).join("_")
    }
    return id.slice(0, 100)
}

export function versionNamespace(projectId: string, number: number): string {
    return path.posix.join(projectId, `v${String(number).padStart(3, "0")}`)
}

export function summarizeVersion(version: Version): VersionSummary {
    const {number, message, timestamp, size, assetCount, totalSize} = version
    return {number, message, timestamp, size, assetCount, totalSize}
}

function escapeXml(value: string): string {
    return value
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
}

export class Project {
    backend: IStorageBackend
    logger: Logger
    configPath: string
    projectName = "EMPTY_NAME"
    projectPath = "EMPTY_PATH"
    projectId = "EMPTY_ID"
    createdAt = ""
    versions: Version[] = []

    private constructor(backend: IStorageBackend, configPath: string, options: ProjectOptions = {}) {
        this.backend = backend
        this.configPath = path.resolve(configPath)
        this.logger = options.logger ?? defaultLogger
    }

    /**
     * Starts tracking a project file: stores it with every asset it references
     * as version 0 and writes the project record next to the file.
     */
    static async initialize(
        projectFilePath: string,
        backend: IStorageBackend,
        options: InitializeOptions = {}
    ): Promise<Project> {
        const file = new File(projectFilePath)
        if (!await file.isFile()) {
            throw new FileNotFoundError(projectFilePath)
        }

        const extensions = options.extensions ?? DEFAULT_PROJECT_EXTENSIONS
        if (!extensions.includes(file.extension.toLowerCase())) {
            throw new InvalidExtensionError(projectFilePath, extensions)
        }

        const configPath = getConfigPath(file.fullPath)
        const existing = await isInitialized(file.fullPath)
        if (existing && !options.force) {
            throw new AlreadyInitializedError(configPath)
        }

        await backend.ready()

        const project = new Project(backend, configPath, options)
        if (existing) {
            project.logger.warn(`Removing existing project record at ${configPath}`)
            await fs.promises.rm(getProjectDir(file.fullPath), {recursive: true, force: true})
        }

        project.projectName = file.name
        project.projectPath = file.fullPath
        project.projectId = sanitizeProjectName(path.parse(file.name).name)
        project.createdAt = new Date().toISOString()

        await project.commit(INITIAL_MESSAGE, file.fullPath)
        return project
    }

    static async fromFile(configPath: string, backend: IStorageBackend, options: ProjectOptions = {}): Promise<Project> {
        if (!await new File(configPath).isFile()) {
            throw new NotInitializedError(configPath)
        }
        const project = new Project(backend, configPath, options)
        await project.load()
        return project
    }

    static async open(projectFilePath: string, backend: IStorageBackend, options: ProjectOptions = {}): Promise<Project> {
        return await Project.fromFile(getConfigPath(projectFilePath), backend, options)
    }

    /**
     * Project namespaces the backend knows about, i.e. those holding at least
     * one stored version.
     */
    static async listProjects(backend: IStorageBackend): Promise<ProjectInfo[]> {
        await backend.ready()
        const namespaces = await backend.execList("")
        return namespaces.map(namespace => ({name: path.posix.basename(namespace), namespace}))
    }

    toJSON(): ProjectDump {
        return {
            projectName: this.projectName,
            projectPath: this.projectPath,
            projectId: this.projectId,
            createdAt: this.createdAt,
            backend: this.backend.kind,
            volume: this.backend.volume,
            versions: this.versions,
        }
    }

    fromJSON(dump: ProjectDump) {
        if (dump.backend !== this.backend.kind || dump.volume !== this.backend.volume) {
            this.logger.warn(
                `Project ${dump.projectName} was stored with the ${dump.backend} backend (${dump.volume}), ` +
                `opening it with ${this.backend.kind} (${this.backend.volume})`
            )
        }
        this.projectName = dump.projectName
        this.projectPath = dump.projectPath
        this.projectId = dump.projectId
        this.createdAt = dump.createdAt
        this.versions = dump.versions
    }

    async load() {
        this.fromJSON(await readProjectDump(this.configPath))
    }

    async save() {
        await writeProjectDump(this.configPath, this.toJSON())
    }

    /**
     * Next ordinal. Equals the number of versions unless versions were
     * removed, in which case it stays past the highest ordinal in use.
     */
    nextVersionNumber(): number {
        const highest = this.versions.reduce((max, v) => Math.max(max, v.number), -1)
        return Math.max(this.versions.length, highest + 1)
    }

    async commit(message: string, projectFilePath: string = this.projectPath): Promise<Version> {
        const file = new File(projectFilePath)
        const stats = await file.stat()
        if (!stats || !stats.isFile()) {
            throw new FileNotFoundError(projectFilePath)
        }

        await this.backend.ready()

        const number = this.nextVersionNumber()
        const extraction = await extractAssets(file.fullPath, this.logger)
        for (const missing of extraction.missingAssets) {
            this.logger.warn(`Referenced asset not found: ${missing}`)
        }

        const namespace = versionNamespace(this.projectId, number)
        await this.backend.makeNamespace(namespace)
        const storageKey = path.posix.join(namespace, file.name)
        await this.backend.copyIn(file.fullPath, storageKey)

        await this.backend.makeNamespace(sharedAssetsNamespace(this.projectId))
        const coordinator = new AssetCoordinator(this.backend, this.projectId, this.versions, this.logger)
        const {stored} = await coordinator.store(extraction.assets)

        const assets: AssetReference[] = stored.map(entry => ({
            originalPath: entry.asset.path,
            relativePath: entry.asset.relativePath,
            filename: entry.asset.filename,
            extension: entry.asset.extension,
            size: entry.asset.size,
            storageKey: entry.storageKey,
        }))

        const version: Version = {
            number,
            message,
            timestamp: new Date().toISOString(),
            size: stats.size,
            storageKey,
            assets,
            assetCount: assets.length,
            totalSize: extraction.totalSize,
        }

        const previous = this.versions[this.versions.length - 1]
        const tracking = createTracking(number, message, assets, previous?.assets ?? [], version.timestamp)
        try {
            await saveTracking(this.backend, namespace, tracking)
        } catch (err) {
            this.logger.warn(`Failed to save asset tracking for version ${number}: ${errorMessage(err)}`)
        }

        const previousPath = this.projectPath
        this.versions.push(version)
        this.projectPath = file.fullPath
        try {
            await this.save()
        } catch (err) {
            this.versions.pop()
            this.projectPath = previousPath
            throw err
        }

        return version
    }

    getVersion(number: number): Version {
        if (!Number.isInteger(number) || number < 0 || number >= this.versions.length) {
            throw new VersionNotFoundError(number)
        }
        // Ordinals are not renumbered after a removal, so search instead of indexing
        const version = this.versions.find(v => v.number === number)
        if (!version) {
            throw new VersionNotFoundError(number)
        }
        return version
    }

    getLatestVersion(): Version | undefined {
        return this.versions[this.versions.length - 1]
    }

    async removeVersion(number: number): Promise<void> {
        if (!this.versions.some(v => v.number === number)) {
            throw new VersionNotFoundError(number)
        }
        if (this.versions.length === 1) {
            throw new LastVersionError(number)
        }

        const before = this.versions
        this.versions = before.filter(v => v.number !== number)
        try {
            await this.save()
        } catch (err) {
            this.versions = before
            throw err
        }
    }

    /**
     * Drops the versions whose stored project file is gone from the backend.
     * Versions without a recorded key are kept, and so is the newest version
     * when every other one would be dropped: a project never has an empty
     * history.
     */
    async pruneMissingVersions(): Promise<number> {
        await this.backend.ready()

        const kept: Version[] = []
        for (const version of this.versions) {
            if (!version.storageKey || await this.backend.exists(version.storageKey)) {
                kept.push(version)
            }
        }

        const latest = this.getLatestVersion()
        if (kept.length === 0 && latest) {
            this.logger.warn(`Every stored version is missing, keeping version ${latest.number}`)
            kept.push(latest)
        }

        const removed = this.versions.length - kept.length
        if (removed > 0) {
            const before = this.versions
            this.versions = kept
            try {
                await this.save()
            } catch (err) {
                this.versions = before
                throw err
            }
        }
        return removed
    }

    /**
     * Copies a stored version back to disk. Assets still present at their
     * original location are left alone; the others are copied to an `assets`
     * directory next to the restored project file, which is rewritten to point
     * at them.
     */
    async restoreVersion(number: number, outputDir: string): Promise<RestoreResult> {
        const version = this.getVersion(number)
        await this.backend.ready()

        const targetDir = path.resolve(outputDir)
        const projectFile = path.join(targetDir, path.posix.basename(version.storageKey))
        if (projectFile === this.projectPath) {
            throw new RestoreConflictError(projectFile)
        }
        await this.backend.copyOut(version.storageKey, projectFile)

        const restoredAssets: string[] = []
        const relinks = new Map<string, string>()
        for (const asset of version.assets) {
            if (await new File(asset.originalPath).isFile()) continue

            const target = path.join(targetDir, RESTORED_ASSETS_DIR, asset.filename)
            await this.backend.copyOut(asset.storageKey, target)
            restoredAssets.push(target)
            relinks.set(asset.originalPath, target)
        }

        let relinked = false
        if (relinks.size > 0) {
            const restored = new File(projectFile)
            let content = (await restored.readData()).toString("utf8")
            for (const [from, to] of relinks) {
                const escaped = escapeXml(from)
                if (!content.includes(escaped)) continue
                content = content.split(escaped).join(escapeXml(to))
                relinked = true
            }
            if (relinked) {
                await restored.writeData(Buffer.from(content, "utf8"))
            }
        }

        return {projectFile, restoredAssets, relinked}
    }

    async loadTracking(number: number): Promise<AssetTracking> {
        const version = this.getVersion(number)
        await this.backend.ready()
        return await loadTracking(this.backend, versionNamespace(this.projectId, version.number))
    }

    /**
     * Removes every stored version and asset of the project, then the local
     * project record.
     */
    async delete(): Promise<void> {
        await this.backend.ready()
        await this.backend.deleteNamespace(this.projectId)
        await fs.promises.rm(path.dirname(this.configPath), {recursive: true, force: true})
    }
}
