import fs from "fs"
import path from "node:path"
import {createProgram} from "../src/cli/program.js"
import {ContextStore, Project, LocalBackend} from "../src/index.js"
import {makeTmp, removeTmp, writeProject, writeSized} from "./helpers.js"

describe("Command line", () => {
    let tmp: string
    let home: string
    let projectFile: string
    let output: string[] = []
    let errors: string[] = []
    const savedEnv = {...process.env}

    const run = async (...args: string[]) => {
        output = []
        errors = []
        await createProgram().exitOverride().parseAsync(args, {from: "user"})
    }

    beforeAll(async () => {
        tmp = await makeTmp("cli")
        home = path.join(tmp, "home")
        process.env.AEVC_HOME = home
        process.env.AEVC_BACKEND = "local"
        process.env.AEVC_LOG_LEVEL = "error"
        delete process.env.AEVC_STORAGE_ROOT

        const clip = await writeSized(path.join(tmp, "work", "clip.mov"), 2048)
        projectFile = await writeProject(path.join(tmp, "work", "My Project.aepx"), [clip])

        jest.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
            output.push(parts.map(String).join(" "))
        })
        jest.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
            errors.push(parts.map(String).join(" "))
        })
    })

    afterEach(() => {
        process.exitCode = undefined
    })

    afterAll(async () => {
        jest.restoreAllMocks()
        process.env = savedEnv
        await removeTmp(tmp)
    })

    test("Runs a project through its whole life", async () => {
        const contexts = new ContextStore(home)
        const backend = new LocalBackend(path.join(home, "storage"))

        await run("init", projectFile)
        expect(output.some(line => line.includes("Initialized My Project.aepx"))).toBe(true)
        expect(await contexts.load()).toEqual({
            projectName: "My Project.aepx",
            configPath: path.join(tmp, "work", ".aevc", "config.json"),
        })

        await run("commit", "Second")
        expect(output.some(line => line.includes("Committed v001: Second"))).toBe(true)

        await run("log")
        expect(output.filter(line => line.includes("v00"))).toHaveLength(2)

        await run("show", "1")
        expect(output.some(line => line.includes("Changes:      0 new, 1 kept, 0 removed"))).toBe(true)

        await run("list")
        expect(output.some(line => line.includes("My_Project") && line.includes("(selected)"))).toBe(true)

        await run("remove", "1")
        expect((await Project.open(projectFile, backend)).versions.map(v => v.number)).toEqual([0])

        const out = path.join(tmp, "restored")
        await run("pull", "0", out)
        expect(fs.existsSync(path.join(out, "My Project.aepx"))).toBe(true)

        await run("delete", "--yes")
        expect(await contexts.load()).toBeUndefined()
        expect(await backend.exists("My_Project")).toBe(false)
        expect(process.exitCode).toBeUndefined()
    })

    test("Explains what removal does to version lookup", () => {
        const remove = createProgram().commands.find(command => command.name() === "remove")

        expect(remove?.description()).toBe(
            "Remove one version from the history. Other versions keep their numbers, " +
            "so versions numbered at or above the new version count can no longer be shown or pulled"
        )
    })

    test("Fails without a selected project", async () => {
        await run("log")

        expect(process.exitCode).toBe(1)
        expect(errors.some(line => line.includes("No project selected"))).toBe(true)
    })

    test("Fails for a version that is not a number", async () => {
        await run("init", projectFile)
        await run("show", "latest")

        expect(process.exitCode).toBe(1)
        expect(errors.some(line => line.includes("Version must be a number, got 'latest'"))).toBe(true)
    })
})
