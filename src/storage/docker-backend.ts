import {spawn} from "node:child_process";
import fs from "fs";
import path from "node:path";
import {IStorageBackend} from "./types.js";
import {
    BackendOperationError,
    BackendUnavailableError,
    BackendVersionError,
    errorMessage,
} from "../errors.js";

export const DEFAULT_CONTAINER = "aevc-storage"
export const DEFAULT_VOLUME = "aevc-data"
export const DEFAULT_STORAGE_PATH = "/storage/projects"
export const DEFAULT_IMAGE = "alpine:latest"
export const MIN_DOCKER_MAJOR = 24

export type CommandResult = {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>

/**
 * Runs a command from an argv array, without a shell, and collects its output.
 * Rejects only when the process cannot be started; a non-zero exit code is
 * returned to the caller.
 */
export const spawnRunner: CommandRunner = (command, args) => new Promise((resolve, reject) => {
    const proc = spawn(command, args, {stdio: ["ignore", "pipe", "pipe"]});
    let stdout = "";
    let stderr = "";
    proc.stdout.setEncoding("utf8").on("data", (chunk: string) => {
        stdout += chunk;
    });
    proc.stderr.setEncoding("utf8").on("data", (chunk: string) => {
        stderr += chunk;
    });
    proc.on("error", reject);
    proc.on("close", code => resolve({exitCode: code ?? -1, stdout, stderr}));
});

export type DockerBackendOptions = {
    container?: string;
    volume?: string;
    storagePath?: string;
    image?: string;
    minMajorVersion?: number;
    run?: CommandRunner;
}

/**
 * Stores objects inside a long-running container whose storage path is backed
 * by a named volume. The container is only reached through `docker cp` and
 * `docker exec`.
 */
export class DockerBackend implements IStorageBackend {
    readonly kind = "docker" as const;
    readonly volume: string;
    readonly container: string;
    readonly storagePath: string;
    private readonly image: string;
    private readonly minMajorVersion: number;
    private readonly run: CommandRunner;

    constructor(options: DockerBackendOptions = {}) {
        this.container = options.container ?? DEFAULT_CONTAINER;
        this.volume = options.volume ?? DEFAULT_VOLUME;
        this.storagePath = options.storagePath ?? DEFAULT_STORAGE_PATH;
        this.image = options.image ?? DEFAULT_IMAGE;
        this.minMajorVersion = options.minMajorVersion ?? MIN_DOCKER_MAJOR;
        this.run = options.run ?? spawnRunner;
    }

    containerPath(key: string): string {
        const resolved = path.posix.join(this.storagePath, key);
        if (resolved !== this.storagePath && !resolved.startsWith(`${this.storagePath}/`)) {
            throw new BackendOperationError("resolve", key, "key points outside the storage root");
        }
        return resolved;
    }

    async ready(): Promise<void> {
        let version: CommandResult;
        try {
            version = await this.run("docker", ["version", "--format", "{{.Server.Version}}"]);
        } catch (err) {
            throw new BackendUnavailableError(this.kind, "Docker is not installed", {cause: err});
        }
        if (version.exitCode !== 0) {
            throw new BackendUnavailableError(this.kind, `Docker daemon is not running (${version.stderr.trim()})`);
        }

        const found = version.stdout.trim();
        const major = Number.parseInt(found.split(".")[0] ?? "", 10);
        if (Number.isNaN(major) || major < this.minMajorVersion) {
            throw new BackendVersionError(this.kind, found || "unknown", `${this.minMajorVersion}.0.0`);
        }

        if (await this.containerListed(true)) return;

        if (await this.containerListed(false)) {
            await this.readyStep(["start", this.container], "failed to start container");
            return;
        }

        await this.readyStep(["volume", "create", this.volume], "failed to create volume");
        await this.readyStep([
            "run", "-d",
            "--name", this.container,
            "-v", `${this.volume}:${this.storagePath}`,
            this.image,
            "tail", "-f", "/dev/null",
        ], "failed to create container");
    }

    async copyIn(localPath: string, key: string): Promise<void> {
        const target = this.containerPath(key);
        await this.docker(["exec", this.container, "mkdir", "-p", path.posix.dirname(target)], "copy-in", key);
        await this.docker(["cp", path.resolve(localPath), `${this.container}:${target}`], "copy-in", key);
    }

    async copyOut(key: string, localPath: string): Promise<void> {
        const target = path.resolve(localPath);
        try {
            await fs.promises.mkdir(path.dirname(target), {recursive: true});
        } catch (err) {
            throw new BackendOperationError("copy-out", key, errorMessage(err), {cause: err});
        }
        await this.docker(["cp", `${this.container}:${this.containerPath(key)}`, target], "copy-out", key);
    }

    async exists(key: string): Promise<boolean> {
        const result = await this.exec(["test", "-e", this.containerPath(key)], "exists", key);
        return result.exitCode === 0;
    }

    async makeNamespace(key: string): Promise<void> {
        await this.docker(["exec", this.container, "mkdir", "-p", this.containerPath(key)], "make-namespace", key);
    }

    async deleteNamespace(key: string): Promise<void> {
        const target = this.containerPath(key);
        if (target === this.storagePath) {
            throw new BackendOperationError("delete-namespace", key, "refusing to delete the storage root");
        }
        await this.docker(["exec", this.container, "rm", "-rf", target], "delete-namespace", key);
    }

    async execList(namespaceRoot: string = ""): Promise<string[]> {
        const base = this.containerPath(namespaceRoot);
        if (!await this.exists(namespaceRoot)) {
            return [];
        }
        const result = await this.docker([
            "exec", this.container,
            "find", base, "-mindepth", "2", "-maxdepth", "2", "-type", "d", "-name", "v[0-9][0-9][0-9]",
        ], "list", namespaceRoot);

        const namespaces = new Set<string>();
        for (const line of result.stdout.split("\n")) {
            const dir = line.trim();
            if (!dir) continue;
            namespaces.add(path.posix.relative(this.storagePath, path.posix.dirname(dir)));
        }
        return [...namespaces].sort();
    }

    private async containerListed(runningOnly: boolean): Promise<boolean> {
        const args = ["ps", ...(runningOnly ? [] : ["-a"]), "--filter", `name=${this.container}`, "--format", "{{.Names}}"];
        const result = await this.run("docker", args);
        if (result.exitCode !== 0) return false;
        return result.stdout.split("\n").some(name => name.trim() === this.container);
    }

    private async readyStep(args: string[], reason: string): Promise<void> {
        const result = await this.run("docker", args);
        if (result.exitCode !== 0) {
            throw new BackendUnavailableError(this.kind, `${reason}: ${result.stderr.trim()}`);
        }
    }

    private async exec(args: string[], operation: string, key: string): Promise<CommandResult> {
        try {
            return await this.run("docker", ["exec", this.container, ...args]);
        } catch (err) {
            throw new BackendOperationError(operation, key, errorMessage(err), {cause: err});
        }
    }

    private async docker(args: string[], operation: string, key: string): Promise<CommandResult> {
        let result: CommandResult;
        try {
            result = await this.run("docker", args);
        } catch (err) {
            throw new BackendOperationError(operation, key, errorMessage(err), {cause: err});
        }
        if (result.exitCode !== 0) {
            throw new BackendOperationError(operation, key, result.stderr.trim() || `exit code ${result.exitCode}`);
        }
        return result;
    }
}
