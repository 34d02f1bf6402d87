import {BackendKind} from "../storage/index.js"

export type AssetReference = {
    originalPath: string // Absolute source path at commit time
    relativePath: string // Relative to the project file's directory
    filename: string
    extension: string // With leading dot
    size: number
    storageKey: string // Key of the stored copy, normally in the shared asset pool
}

export type Version = {
    number: number
    message: string
    timestamp: string
    size: number // Project file size in bytes
    storageKey: string // Key of the stored project file
    assets: AssetReference[]
    assetCount: number
    totalSize: number // Bytes of every asset found at commit time
}

export type ProjectDump = {
    projectName: string
    projectPath: string
    projectId: string
    createdAt: string
    backend: BackendKind
    volume: string
    versions: Version[]
}

export type ExtractedAsset = {
    path: string
    relativePath: string
    filename: string
    extension: string
    size: number
}

export type ExtractionResult = {
    projectFile: string
    assets: ExtractedAsset[] // Sorted by absolute path
    missingAssets: string[] // Sorted
    totalSize: number
}

export type StoredAsset = {
    asset: ExtractedAsset
    storageKey: string
    copied: boolean
}

export type FailedAsset = {
    asset: ExtractedAsset
    error: string
}

export type StoreResult = {
    stored: StoredAsset[]
    failed: FailedAsset[]
}

export type AssetState = "present" | "new" | "removed"

export type AssetStatus = {
    filename: string
    path: string
    extension: string
    size: number
    status: AssetState
    present: boolean // Present in this commit
    inPrevious: boolean // Present in the previous commit
}

export type AssetTracking = {
    version: number
    commitMessage: string
    timestamp: string
    assets: AssetStatus[]
    totalAssets: number
    presentAssets: number
    missingAssets: number
    newAssets: number
    removedAssets: number
}

export type ProjectContext = {
    projectName: string
    configPath: string
}

export type ProjectInfo = {
    name: string
    namespace: string
}

export type RestoreResult = {
    projectFile: string
    restoredAssets: string[] // Assets copied out of storage because their original file is gone
    relinked: boolean // Whether the restored project file was rewritten to point at restored assets
}
