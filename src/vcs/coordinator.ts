import path from "node:path"
import {IStorageBackend} from "../storage/index.js"
import {errorMessage} from "../errors.js"
import {Logger, logger as defaultLogger} from "../logger.js"
import {ExtractedAsset, StoreResult, Version} from "./types.js"

export const SHARED_ASSETS_DIR = "assets"

export function sharedAssetsNamespace(projectId: string): string {
    return path.posix.join(projectId, SHARED_ASSETS_DIR)
}

/**
 * Filename to storage key of every asset stored by earlier versions. Later
 * versions win, as they reflect where the pool put the file last.
 */
export function buildAssetIndex(versions: Version[]): Map<string, string> {
    const index = new Map<string, string>()
    for (const version of versions) {
        for (const asset of version.assets) {
            index.set(asset.filename, asset.storageKey)
        }
    }
    return index
}

/**
 * Puts the assets of a commit into the project's shared pool. An asset is
 * identified by its filename only: when the pool already holds an object under
 * that name it is reused as is, without looking at the bytes.
 */
export class AssetCoordinator {
    private readonly index: Map<string, string>

    constructor(
        private readonly backend: IStorageBackend,
        private readonly projectId: string,
        priorVersions: Version[],
        private readonly logger: Logger = defaultLogger
    ) {
        this.index = buildAssetIndex(priorVersions)
    }

    sharedKey(filename: string): string {
        return path.posix.join(sharedAssetsNamespace(this.projectId), filename)
    }

    async store(assets: ExtractedAsset[]): Promise<StoreResult> {
        const result: StoreResult = {stored: [], failed: []}

        for (const asset of assets) {
            const sharedKey = this.sharedKey(asset.filename)
            try {
                if (await this.backend.exists(sharedKey)) {
                    const storageKey = this.index.get(asset.filename) ?? sharedKey
                    result.stored.push({asset, storageKey, copied: false})
                    this.logger.info(`Reusing existing asset: ${asset.filename}`)
                    continue
                }

                await this.backend.copyIn(asset.path, sharedKey)
                this.index.set(asset.filename, sharedKey)
                result.stored.push({asset, storageKey: sharedKey, copied: true})
                this.logger.info(`Copied new asset: ${asset.filename}`)
            } catch (err) {
                const error = errorMessage(err)
                result.failed.push({asset, error})
                this.logger.warn(`Failed to store asset ${asset.filename}: ${error}`)
            }
        }

        return result
    }
}
