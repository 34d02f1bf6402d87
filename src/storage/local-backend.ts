import {IStorageBackend} from "./types.js";
import fs from "fs";
import path from "node:path";
import {glob} from "glob";
import {BackendOperationError, BackendUnavailableError, errorMessage} from "../errors.js";

/**
 * Stores objects as plain files under a root directory on the local disk.
 */
export class LocalBackend implements IStorageBackend {
    readonly kind = "local" as const;
    readonly volume: string;

    constructor(root: string) {
        this.volume = path.resolve(root);
    }

    resolveKey(key: string): string {
        const resolved = path.resolve(this.volume, ...key.split("/"));
        const relative = path.relative(this.volume, resolved);
        if (relative.startsWith("..") || path.isAbsolute(relative)) {
            throw new BackendOperationError("resolve", key, "key points outside the storage root");
        }
        return resolved;
    }

    async ready(): Promise<void> {
        try {
            await fs.promises.mkdir(this.volume, {recursive: true});
            await fs.promises.access(this.volume, fs.constants.W_OK);
        } catch (err) {
            throw new BackendUnavailableError(this.kind, `storage root '${this.volume}' is not writable`, {cause: err});
        }
    }

    async copyIn(localPath: string, key: string): Promise<void> {
        const to = this.resolveKey(key);
        try {
            await fs.promises.mkdir(path.dirname(to), {recursive: true});
            await fs.promises.copyFile(path.resolve(localPath), to);
        } catch (err) {
            throw new BackendOperationError("copy-in", key, errorMessage(err), {cause: err});
        }
    }

    async copyOut(key: string, localPath: string): Promise<void> {
        const from = this.resolveKey(key);
        const to = path.resolve(localPath);
        try {
            await fs.promises.mkdir(path.dirname(to), {recursive: true});
            await fs.promises.copyFile(from, to);
        } catch (err) {
            throw new BackendOperationError("copy-out", key, errorMessage(err), {cause: err});
        }
    }

    async exists(key: string): Promise<boolean> {
        try {
            await fs.promises.access(this.resolveKey(key), fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async makeNamespace(key: string): Promise<void> {
        try {
            await fs.promises.mkdir(this.resolveKey(key), {recursive: true});
        } catch (err) {
            throw new BackendOperationError("make-namespace", key, errorMessage(err), {cause: err});
        }
    }

    async deleteNamespace(key: string): Promise<void> {
        if (!key) {
            throw new BackendOperationError("delete-namespace", key, "refusing to delete the storage root");
        }
        try {
            await fs.promises.rm(this.resolveKey(key), {recursive: true, force: true});
        } catch (err) {
            throw new BackendOperationError("delete-namespace", key, errorMessage(err), {cause: err});
        }
    }

    async execList(namespaceRoot: string = ""): Promise<string[]> {
        const base = namespaceRoot ? this.resolveKey(namespaceRoot) : this.volume;
        if (!await this.exists(namespaceRoot)) {
            return [];
        }
        const versionDirs = await glob("*/v[0-9][0-9][0-9]/", {cwd: base, posix: true});
        const namespaces = new Set(versionDirs.map(dir => path.posix.join(namespaceRoot, path.posix.dirname(dir))));
        return [...namespaces].sort();
    }
}
