import {Hono} from "hono"
import type {Context} from "hono"
import {AevcError, NotInitializedError, ProjectLoadError, VersionNotFoundError, errorMessage} from "../errors.js"
import {Logger, logger as defaultLogger} from "../logger.js"
import {IStorageBackend} from "../storage/index.js"
import {Project, summarizeVersion, VersionSummary} from "../vcs/index.js"

export type ApiResponse<T> =
    | { success: true, data: T }
    | { success: false, error: string }

export type ProjectListItem = {
    id: string
    name: string
    namespace: string
    commitCount: number
}

export type ProjectCommitsResponse = {
    projectId: string
    projectName: string
    commits: VersionSummary[]
}

export type ApiOptions = {
    backend: IStorageBackend
    // Project records the server may read, looked up again on every request
    configPaths: () => Promise<string[]>
    logger?: Logger
}

class ProjectNotFoundError extends AevcError {
    constructor(public readonly projectId: string) {
        super(`Project '${projectId}' not found`)
    }
}

function statusFor(err: unknown): 404 | 500 {
    if (err instanceof ProjectNotFoundError || err instanceof VersionNotFoundError || err instanceof NotInitializedError) {
        return 404
    }
    return 500
}

function sendError(c: Context, err: unknown) {
    return c.json({success: false, error: errorMessage(err)} satisfies ApiResponse<never>, statusFor(err))
}

export function createRoutes(options: ApiOptions) {
    const {backend} = options
    const logger = options.logger ?? defaultLogger
    const app = new Hono()

    const loadProjects = async (): Promise<Project[]> => {
        const projects: Project[] = []
        for (const configPath of await options.configPaths()) {
            try {
                projects.push(await Project.fromFile(configPath, backend, {logger}))
            } catch (err) {
                if (!(err instanceof ProjectLoadError || err instanceof NotInitializedError)) throw err
                logger.warn(`Skipping project record ${configPath}: ${err.message}`)
            }
        }
        return projects
    }

    const findProject = async (projectId: string): Promise<Project> => {
        const project = (await loadProjects()).find(p => p.projectId === projectId)
        if (!project) {
            throw new ProjectNotFoundError(projectId)
        }
        return project
    }

    app.get("/health", c => c.json({success: true, data: {status: "ok"}} satisfies ApiResponse<{ status: string }>))

    // GET /api/projects - projects stored in the backend
    app.get("/api/projects", async c => {
        try {
            const stored = await Project.listProjects(backend)
            const known = await loadProjects()
            const items: ProjectListItem[] = stored.map(info => {
                const project = known.find(p => p.projectId === info.name)
                return {
                    id: info.name,
                    name: project ? project.projectName : info.name,
                    namespace: info.namespace,
                    commitCount: project ? project.versions.length : 0,
                }
            })
            return c.json({success: true, data: items} satisfies ApiResponse<ProjectListItem[]>)
        } catch (err) {
            return sendError(c, err)
        }
    })

    // GET /api/projects/:id/commits - version summaries of one project
    app.get("/api/projects/:id/commits", async c => {
        try {
            const project = await findProject(c.req.param("id"))
            const data: ProjectCommitsResponse = {
                projectId: project.projectId,
                projectName: project.projectName,
                commits: project.versions.map(summarizeVersion),
            }
            return c.json({success: true, data} satisfies ApiResponse<ProjectCommitsResponse>)
        } catch (err) {
            return sendError(c, err)
        }
    })

    // GET /api/projects/:id/commits/:number - one version with its assets
    app.get("/api/projects/:id/commits/:number", async c => {
        const raw = c.req.param("number")
        if (!/^\d+$/.test(raw)) {
            return c.json({success: false, error: `Invalid version number '${raw}'`} satisfies ApiResponse<never>, 400)
        }
        try {
            const project = await findProject(c.req.param("id"))
            const version = project.getVersion(Number(raw))
            return c.json({success: true, data: version})
        } catch (err) {
            return sendError(c, err)
        }
    })

    return app
}
