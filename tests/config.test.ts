import path from "node:path"
import {ConfigError, createBackend, DockerBackend, loadConfig, LocalBackend} from "../src/index.js"

describe("Configuration", () => {
    test("Falls back to defaults under the home directory", () => {
        const config = loadConfig({AEVC_HOME: "/srv/aevc"})

        expect(config).toEqual({
            homeDir: "/srv/aevc",
            backend: "local",
            storageRoot: "/srv/aevc/storage",
            dockerContainer: "aevc-storage",
            dockerVolume: "aevc-data",
            dockerStoragePath: "/storage/projects",
            projectExtensions: [".aepx"],
            logLevel: "info",
            port: 8080,
        })
    })

    test("Reads every variable", () => {
        const config = loadConfig({
            AEVC_HOME: "/srv/aevc",
            AEVC_BACKEND: "docker",
            AEVC_STORAGE_ROOT: "/data/objects",
            AEVC_DOCKER_CONTAINER: "store",
            AEVC_DOCKER_VOLUME: "store-data",
            AEVC_DOCKER_STORAGE_PATH: "/data",
            AEVC_PROJECT_EXTENSIONS: "AEPX, .aep,,",
            AEVC_LOG_LEVEL: "debug",
            AEVC_PORT: "9000",
        })

        expect(config).toMatchObject({
            backend: "docker",
            storageRoot: "/data/objects",
            dockerContainer: "store",
            dockerVolume: "store-data",
            dockerStoragePath: "/data",
            projectExtensions: [".aepx", ".aep"],
            logLevel: "debug",
            port: 9000,
        })
    })

    test("Resolves relative paths", () => {
        const config = loadConfig({AEVC_HOME: "relative-home"})
        expect(config.homeDir).toBe(path.resolve("relative-home"))
    })

    test.each([
        ["AEVC_BACKEND", "s3"],
        ["AEVC_PORT", "not-a-port"],
        ["AEVC_PORT", "70000"],
        ["AEVC_LOG_LEVEL", "verbose"],
        ["AEVC_DOCKER_STORAGE_PATH", "relative/path"],
    ])("Rejects %s=%s", (name, value) => {
        expect(() => loadConfig({AEVC_HOME: "/srv/aevc", [name]: value})).toThrow(ConfigError)
    })

    test("Creates the configured backend", () => {
        const local = createBackend(loadConfig({AEVC_HOME: "/srv/aevc"}))
        const docker = createBackend(loadConfig({AEVC_HOME: "/srv/aevc", AEVC_BACKEND: "docker", AEVC_DOCKER_VOLUME: "vol"}))

        expect(local).toBeInstanceOf(LocalBackend)
        expect(local.volume).toBe("/srv/aevc/storage")
        expect(docker).toBeInstanceOf(DockerBackend)
        expect(docker.volume).toBe("vol")
    })
})
