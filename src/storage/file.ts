import fs from "fs";
import path from "node:path";
import {IFile} from "./types.js";
import {errorMessage, hasErrorCode} from "../errors.js";

export class File implements IFile {
    directory: string;
    name: string;
    extension: string;
    fullPath: string;

    constructor(fullPath: string) {
        this.fullPath = path.resolve(fullPath);
        this.name = path.basename(this.fullPath);
        if (!this.name) {
            throw new Error("Unable to parse file name")
        }
        this.extension = path.extname(this.name);
        this.directory = path.dirname(this.fullPath);
    }

    async stat(): Promise<fs.Stats | undefined> {
        try {
            return await fs.promises.stat(this.fullPath);
        } catch (err) {
            if (hasErrorCode(err, "ENOENT", "ENOTDIR")) {
                return undefined;
            }
            throw new Error(`Failed to stat '${this.fullPath}': ${errorMessage(err)}`, {cause: err});
        }
    }

    async isFile(): Promise<boolean> {
        const stats = await this.stat();
        return stats !== undefined && stats.isFile();
    }

    async readData(): Promise<Buffer> {
        try {
            return await fs.promises.readFile(this.fullPath);
        } catch (err) {
            throw new Error(`Failed to read file content: ${errorMessage(err)}`, {cause: err});
        }
    }

    async writeData(data: Buffer): Promise<void> {
        try {
            await fs.promises.mkdir(this.directory, {recursive: true});
            return await fs.promises.writeFile(this.fullPath, data);
        } catch (err) {
            throw new Error(`Failed to write file content: ${errorMessage(err)}`, {cause: err});
        }
    }
}
