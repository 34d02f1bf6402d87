import fs from "fs"
import os from "node:os"
import path from "node:path"
import {z} from "zod"
import {IStorageBackend} from "../storage/index.js"
import {AssetReference, AssetStatus, AssetTracking} from "./types.js"

export const TRACKING_FILE = "asset-tracking.json"

type TrackedAsset = Pick<AssetReference, "filename" | "extension" | "size" | "storageKey">

/**
 * Classifies every asset of a commit against the previous commit by filename:
 * kept assets are "present", unseen ones "new", and assets of the previous
 * commit that are gone get a synthetic "removed" entry.
 */
export function createTracking(
    version: number,
    commitMessage: string,
    current: TrackedAsset[],
    previous: TrackedAsset[],
    timestamp: string = new Date().toISOString()
): AssetTracking {
    const previousNames = new Set(previous.map(a => a.filename))
    const currentNames = new Set(current.map(a => a.filename))

    const assets: AssetStatus[] = []
    let presentAssets = 0
    let newAssets = 0
    let removedAssets = 0

    for (const asset of current) {
        const inPrevious = previousNames.has(asset.filename)
        assets.push({
            filename: asset.filename,
            path: asset.storageKey,
            extension: asset.extension,
            size: asset.size,
            status: inPrevious ? "present" : "new",
            present: true,
            inPrevious,
        })
        presentAssets++
        if (!inPrevious) newAssets++
    }

    for (const asset of previous) {
        if (currentNames.has(asset.filename)) continue
        assets.push({
            filename: asset.filename,
            path: asset.storageKey,
            extension: asset.extension,
            size: asset.size,
            status: "removed",
            present: false,
            inPrevious: true,
        })
        removedAssets++
    }

    return {
        version,
        commitMessage,
        timestamp,
        assets,
        totalAssets: assets.length,
        presentAssets,
        missingAssets: assets.length - presentAssets,
        newAssets,
        removedAssets,
    }
}

const AssetStatusSchema = z.object({
    filename: z.string(),
    path: z.string(),
    extension: z.string(),
    size: z.number(),
    status: z.enum(["present", "new", "removed"]),
    present: z.boolean(),
    inPrevious: z.boolean(),
})

export const AssetTrackingSchema = z.object({
    version: z.number().int(),
    commitMessage: z.string(),
    timestamp: z.string(),
    assets: z.array(AssetStatusSchema),
    totalAssets: z.number().int(),
    presentAssets: z.number().int(),
    missingAssets: z.number().int(),
    newAssets: z.number().int(),
    removedAssets: z.number().int(),
}) satisfies z.ZodType<AssetTracking>

export function trackingKey(versionNamespace: string): string {
    return path.posix.join(versionNamespace, TRACKING_FILE)
}

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "aevc-tracking-"))
    try {
        return await fn(dir)
    } finally {
        await fs.promises.rm(dir, {recursive: true, force: true})
    }
}

export async function saveTracking(backend: IStorageBackend, versionNamespace: string, tracking: AssetTracking): Promise<string> {
    const key = trackingKey(versionNamespace)
    await withTempDir(async dir => {
        const tmpFile = path.join(dir, TRACKING_FILE)
        await fs.promises.writeFile(tmpFile, JSON.stringify(tracking, null, 2))
        await backend.copyIn(tmpFile, key)
    })
    return key
}

export async function loadTracking(backend: IStorageBackend, versionNamespace: string): Promise<AssetTracking> {
    const key = trackingKey(versionNamespace)
    return await withTempDir(async dir => {
        const tmpFile = path.join(dir, TRACKING_FILE)
        await backend.copyOut(key, tmpFile)
        const data: unknown = JSON.parse(await fs.promises.readFile(tmpFile, "utf8"))
        return AssetTrackingSchema.parse(data)
    })
}
