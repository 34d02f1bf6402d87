import fs from "fs"
import os from "node:os"
import path from "node:path"
import {Logger} from "../src/index.js"

export const MB = 1024 * 1024

export const makeTmp = async (prefix: string): Promise<string> => {
    return await fs.promises.mkdtemp(path.join(os.tmpdir(), `aevc-${prefix}-`))
}

export const removeTmp = async (dir: string): Promise<void> => {
    await fs.promises.rm(dir, {recursive: true, force: true})
}

export const silentLogger = (): Logger => new Logger({sink: null, level: "debug"})

export const writeFile = async (filePath: string, content: string | Buffer): Promise<string> => {
    await fs.promises.mkdir(path.dirname(filePath), {recursive: true})
    await fs.promises.writeFile(filePath, content)
    return filePath
}

export const writeSized = async (filePath: string, size: number, fill: number = 0): Promise<string> => {
    return await writeFile(filePath, Buffer.alloc(size, fill))
}

const escapeAttr = (value: string) => value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")

/**
 * Minimal After Effects XML project referencing each path through a
 * fileReference element.
 */
export const aepx = (references: string[]): string => [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<AfterEffectsProject xmlns="http://www.adobe.com/products/aftereffects/1.0">`,
    ...references.map(ref => `  <Pin><Als2><fileReference fullpath="${escapeAttr(ref)}" target_is_folder="0"/></Als2></Pin>`),
    `</AfterEffectsProject>`,
    ``,
].join("\n")

export const writeProject = async (filePath: string, references: string[]): Promise<string> => {
    return await writeFile(filePath, aepx(references))
}
