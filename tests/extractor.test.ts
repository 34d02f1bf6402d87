import path from "node:path"
import {collectCandidates, extractAssets, ExtractionError} from "../src/index.js"
import {makeTmp, removeTmp, silentLogger, writeFile, writeProject, writeSized} from "./helpers.js"

describe("Asset reference extraction", () => {
    let tmp: string

    beforeAll(async () => {
        tmp = await makeTmp("extractor")
        await writeSized(path.join(tmp, "footage", "video1.mp4"), 1000)
        await writeSized(path.join(tmp, "images", "image1.png"), 200)
        await writeSized(path.join(tmp, "audio", "track.wav"), 30)
        await writeSized(path.join(tmp, "sub", "other.png"), 4)
        await writeSized(path.join(tmp, "named.psd"), 5)
    })

    afterAll(async () => {
        await removeTmp(tmp)
    })

    test("Collects every recognised reference form", async () => {
        const video = path.join(tmp, "footage", "video1.mp4")
        const projectFile = await writeFile(path.join(tmp, "forms.aepx"), [
            `<?xml version="1.0" encoding="UTF-8"?>`,
            `<AfterEffectsProject xmlns:ae="http://www.adobe.com/products/aftereffects/1.0">`,
            `  <ae:fileReference ae:fullpath="${video}"/>`,
            `  <fullpath>`,
            `     images/image1.png`,
            `  </fullpath>`,
            `  <file path="./audio/track.wav" fileName="named.psd" kind="ignored.txt">sub/other.png</file>`,
            `  <src>https://example.com/remote.png</src>`,
            `  <source>missing.mov</source>`,
            `  <other fullpath="not-a-candidate.png">also-not.png</other>`,
            `</AfterEffectsProject>`,
        ].join("\n"))

        const candidates = await collectCandidates(projectFile, silentLogger())

        expect([...candidates].sort()).toEqual([
            "./audio/track.wav",
            "https://example.com/remote.png",
            "images/image1.png",
            "missing.mov",
            "named.psd",
            "sub/other.png",
            video,
        ].sort())
    })

    test("Resolves, sizes and sorts found assets", async () => {
        const projectFile = await writeFile(path.join(tmp, "resolve.aepx"), [
            `<AfterEffectsProject>`,
            `  <fileReference fullpath="sub/other.png"/>`,
            `  <fileReference fullpath="${path.join(tmp, "footage", "video1.mp4")}"/>`,
            `  <fileReference fullpath="audio/track.wav"/>`,
            `  <fileReference fullpath="https://example.com/a.png"/>`,
            `  <fileReference fullpath="file:///tmp/b.png"/>`,
            `  <fileReference fullpath="gone/zzz.mov"/>`,
            `  <fileReference fullpath="gone/aaa.mov"/>`,
            `  <fileReference fullpath="footage"/>`,
            `</AfterEffectsProject>`,
        ].join("\n"))

        const result = await extractAssets(projectFile, silentLogger())

        expect(result.projectFile).toBe(projectFile)
        expect(result.assets).toEqual([
            {
                path: path.join(tmp, "audio", "track.wav"),
                relativePath: path.join("audio", "track.wav"),
                filename: "track.wav",
                extension: ".wav",
                size: 30,
            },
            {
                path: path.join(tmp, "footage", "video1.mp4"),
                relativePath: path.join("footage", "video1.mp4"),
                filename: "video1.mp4",
                extension: ".mp4",
                size: 1000,
            },
            {
                path: path.join(tmp, "sub", "other.png"),
                relativePath: path.join("sub", "other.png"),
                filename: "other.png",
                extension: ".png",
                size: 4,
            },
        ])
        expect(result.missingAssets).toEqual([
            path.join(tmp, "footage"),
            path.join(tmp, "gone", "aaa.mov"),
            path.join(tmp, "gone", "zzz.mov"),
        ])
        expect(result.totalSize).toBe(1034)
    })

    test("Counts an asset once when it is referenced in several ways", async () => {
        const image = path.join(tmp, "images", "image1.png")
        const projectFile = await writeFile(path.join(tmp, "dupes.aepx"), [
            `<AfterEffectsProject>`,
            `  <fileReference fullpath="${image}"/>`,
            `  <fullpath>${image}</fullpath>`,
            `  <fullpath>./images/image1.png</fullpath>`,
            `  <path>images/../images/image1.png</path>`,
            `</AfterEffectsProject>`,
        ].join("\n"))

        const result = await extractAssets(projectFile, silentLogger())

        expect(result.assets.map(a => a.path)).toEqual([image])
        expect(result.totalSize).toBe(200)
    })

    test("Gives the same result on repeated runs", async () => {
        const projectFile = await writeProject(path.join(tmp, "repeat.aepx"), [
            "sub/other.png",
            "footage/video1.mp4",
            "nowhere/x.png",
        ])
        const logger = silentLogger()

        const first = await extractAssets(projectFile, logger)
        const second = await extractAssets(projectFile, logger)

        expect(second).toEqual(first)
        expect(first.assets.map(a => a.filename)).toEqual(["video1.mp4", "other.png"])
        expect(first.missingAssets).toEqual([path.join(tmp, "nowhere", "x.png")])
    })

    test("Yields nothing for a malformed document", async () => {
        const projectFile = await writeFile(path.join(tmp, "broken.aepx"), `<AfterEffectsProject><fileReference fullpath="sub/other.png"></AfterEffectsProject>`)
        const logger = silentLogger()

        const result = await extractAssets(projectFile, logger)

        expect(result.assets).toEqual([])
        expect(result.missingAssets).toEqual([])
        expect(result.totalSize).toBe(0)
        expect(logger.getEntries("warn")).toHaveLength(1)
        expect(logger.getEntries("warn")[0]?.message).toContain("is not well-formed XML")
    })

    test("Yields nothing for an empty document", async () => {
        const projectFile = await writeFile(path.join(tmp, "empty.aepx"), "")

        const result = await extractAssets(projectFile, silentLogger())

        expect(result).toEqual({projectFile, assets: [], missingAssets: [], totalSize: 0})
    })

    test("Fails when the project file cannot be read", async () => {
        await expect(extractAssets(path.join(tmp, "absent.aepx"), silentLogger())).rejects.toBeInstanceOf(ExtractionError)
    })
})
