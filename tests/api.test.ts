import path from "node:path"
import {createRoutes, LocalBackend, Project} from "../src/index.js"
import {makeTmp, removeTmp, silentLogger, writeProject, writeSized} from "./helpers.js"

describe("HTTP API", () => {
    let tmp: string
    let backend: LocalBackend
    let project: Project
    let missingRecord: string

    beforeAll(async () => {
        tmp = await makeTmp("api")
        backend = new LocalBackend(path.join(tmp, "storage"))
        const clip = await writeSized(path.join(tmp, "work", "clip.mov"), 64)
        const projectFile = await writeProject(path.join(tmp, "work", "demo.aepx"), [clip])
        project = await Project.initialize(projectFile, backend, {logger: silentLogger()})
        await project.commit("Second")
        missingRecord = path.join(tmp, "gone", ".aevc", "config.json")
    })

    afterAll(async () => {
        await removeTmp(tmp)
    })

    const app = (configPaths: string[] = [project.configPath]) => {
        const logger = silentLogger()
        return {logger, routes: createRoutes({backend, logger, configPaths: async () => configPaths})}
    }

    test("Reports health", async () => {
        const res = await app().routes.request("/health")

        expect(res.status).toBe(200)
        expect(await res.json()).toEqual({success: true, data: {status: "ok"}})
    })

    test("Lists stored projects and skips unreadable records", async () => {
        const {logger, routes} = app([missingRecord, project.configPath])

        const res = await routes.request("/api/projects")

        expect(res.status).toBe(200)
        expect(await res.json()).toEqual({
            success: true,
            data: [{id: "demo", name: "demo.aepx", namespace: "demo", commitCount: 2}],
        })
        expect(logger.getEntries("warn").map(e => e.message)).toEqual([
            `Skipping project record ${missingRecord}: No project found at '${missingRecord}'`,
        ])
    })

    test("Lists a stored project without a known record by its id", async () => {
        const res = await app([]).routes.request("/api/projects")

        expect(await res.json()).toEqual({
            success: true,
            data: [{id: "demo", name: "demo", namespace: "demo", commitCount: 0}],
        })
    })

    test("Lists the commits of a project", async () => {
        const res = await app().routes.request("/api/projects/demo/commits")

        expect(res.status).toBe(200)
        expect(await res.json()).toEqual({
            success: true,
            data: {
                projectId: "demo",
                projectName: "demo.aepx",
                commits: project.versions.map(v => ({
                    number: v.number,
                    message: v.message,
                    timestamp: v.timestamp,
                    size: v.size,
                    assetCount: v.assetCount,
                    totalSize: v.totalSize,
                })),
            },
        })
    })

    test("Shows one commit with its assets", async () => {
        const res = await app().routes.request("/api/projects/demo/commits/1")

        expect(res.status).toBe(200)
        expect(await res.json()).toEqual({success: true, data: project.getVersion(1)})
    })

    test("Answers 404 for unknown projects and versions", async () => {
        const unknownProject = await app().routes.request("/api/projects/nope/commits")
        const unknownVersion = await app().routes.request("/api/projects/demo/commits/9")

        expect(unknownProject.status).toBe(404)
        expect(await unknownProject.json()).toEqual({success: false, error: "Project 'nope' not found"})
        expect(unknownVersion.status).toBe(404)
        expect(await unknownVersion.json()).toEqual({success: false, error: "Version 9 does not exist"})
    })

    test("Answers 400 for a version that is not a number", async () => {
        const res = await app().routes.request("/api/projects/demo/commits/latest")

        expect(res.status).toBe(400)
        expect(await res.json()).toEqual({success: false, error: "Invalid version number 'latest'"})
    })
})
