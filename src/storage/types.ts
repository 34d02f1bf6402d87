import fs from "fs"

export type BackendKind = "local" | "docker"

export interface IFile {
    directory: string;
    name: string; // file name including extension
    extension: string; // with leading dot, "" when there is none
    fullPath: string;
    stat: () => Promise<fs.Stats | undefined>;
    isFile: () => Promise<boolean>;
    readData: () => Promise<Buffer>;
    writeData: (data: Buffer) => Promise<void>;
}

/**
 * Key-addressed byte store. Keys are "/"-separated, relative to the backend's
 * storage root, e.g. `my_project/v001/my project.aepx`.
 */
export interface IStorageBackend {
    readonly kind: BackendKind;
    readonly volume: string;
    ready: () => Promise<void>;
    copyIn: (localPath: string, key: string) => Promise<void>;
    copyOut: (key: string, localPath: string) => Promise<void>;
    exists: (key: string) => Promise<boolean>;
    makeNamespace: (key: string) => Promise<void>;
    deleteNamespace: (key: string) => Promise<void>;
    // Keys of the namespaces under namespaceRoot that hold at least one version directory
    execList: (namespaceRoot: string) => Promise<string[]>;
}
