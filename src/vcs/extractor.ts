import fs from "fs"
import path from "node:path"
import * as sax from "sax"
import {File} from "../storage/index.js"
import {ExtractionError, errorMessage} from "../errors.js"
import {Logger, logger as defaultLogger} from "../logger.js"
import {ExtractedAsset, ExtractionResult} from "./types.js"

const PATH_ELEMENTS = new Set(["file", "path", "src", "source"])
const URI_PREFIXES = ["http://", "https://", "file://"]

type Frame = {
    name: string // Local name, namespace prefix stripped
    text: string // Text that appears before the first child element
    childSeen: boolean
}

function localName(name: string): string {
    return name.slice(name.indexOf(":") + 1)
}

function attributeValue(attr: string | sax.QualifiedAttribute): string {
    return typeof attr === "string" ? attr : attr.value
}

/**
 * Streams the project document and returns every string that may name an
 * asset file. A document that is not well-formed yields no candidates.
 */
export function collectCandidates(projectFilePath: string, logger: Logger = defaultLogger): Promise<Set<string>> {
    return new Promise((resolve, reject) => {
        const candidates = new Set<string>()
        const stack: Frame[] = []
        let parseError: Error | undefined

        const add = (value: string | undefined) => {
            const trimmed = value?.trim()
            if (trimmed) candidates.add(trimmed)
        }

        const input = fs.createReadStream(projectFilePath)
        const parser = sax.createStream(true, {trim: false, normalize: false})

        parser.on("opentag", tag => {
            const parent = stack[stack.length - 1]
            if (parent) parent.childSeen = true

            const name = localName(tag.name)
            stack.push({name, text: "", childSeen: false})

            for (const [rawAttr, rawValue] of Object.entries(tag.attributes)) {
                const attr = localName(rawAttr)
                const value = attributeValue(rawValue)

                if (name.includes("fileReference") && attr === "fullpath") {
                    add(value)
                }
                if (PATH_ELEMENTS.has(name)) {
                    const lower = attr.toLowerCase()
                    if (lower.includes("path") || lower.includes("file")) {
                        add(value)
                    }
                }
            }
        })

        const onText = (text: string) => {
            const frame = stack[stack.length - 1]
            if (frame && !frame.childSeen) frame.text += text
        }
        parser.on("text", onText)
        parser.on("cdata", onText)

        parser.on("closetag", () => {
            const frame = stack.pop()
            if (!frame) return
            if (frame.name === "fullpath" || PATH_ELEMENTS.has(frame.name)) {
                add(frame.text)
            }
        })

        parser.on("error", err => {
            parseError ??= err
        })

        parser.on("end", () => {
            if (parseError) {
                logger.warn(`Project file '${projectFilePath}' is not well-formed XML, no assets extracted: ${parseError.message}`)
                resolve(new Set())
                return
            }
            resolve(candidates)
        })

        // Fed by hand: pipe() would unpipe on the first parse error and the
        // parser would never see the end of the input.
        input.on("data", chunk => parser.write(chunk))
        input.on("end", () => parser.end())
        input.on("error", err => {
            reject(new ExtractionError(projectFilePath, err.message, {cause: err}))
        })
    })
}

function compare(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

/**
 * Finds the asset files a project file references, resolves them against the
 * project file's directory and splits them into found and missing files.
 */
export async function extractAssets(projectFilePath: string, logger: Logger = defaultLogger): Promise<ExtractionResult> {
    const projectFile = path.resolve(projectFilePath)
    const projectDir = path.dirname(projectFile)
    const candidates = await collectCandidates(projectFile, logger)

    const resolved = new Set<string>()
    for (const candidate of candidates) {
        if (URI_PREFIXES.some(prefix => candidate.startsWith(prefix))) continue
        resolved.add(path.resolve(projectDir, candidate))
    }

    const assets: ExtractedAsset[] = []
    const missingAssets: string[] = []
    let totalSize = 0

    for (const assetPath of resolved) {
        const file = new File(assetPath)
        let stats: fs.Stats | undefined
        try {
            stats = await file.stat()
        } catch (err) {
            logger.debug(`Cannot stat '${assetPath}', treating it as missing: ${errorMessage(err)}`)
        }

        if (!stats || !stats.isFile()) {
            missingAssets.push(assetPath)
            continue
        }

        assets.push({
            path: assetPath,
            relativePath: path.relative(projectDir, assetPath),
            filename: file.name,
            extension: file.extension,
            size: stats.size,
        })
        totalSize += stats.size
    }

    assets.sort((a, b) => compare(a.path, b.path))
    missingAssets.sort(compare)

    return {projectFile, assets, missingAssets, totalSize}
}
