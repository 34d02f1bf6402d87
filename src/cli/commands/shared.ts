import {InvalidArgumentError} from "commander"

export function parseVersionNumber(raw: string): number {
    if (!/^\d+$/.test(raw)) {
        throw new InvalidArgumentError(`Version must be a number, got '${raw}'`)
    }
    return Number(raw)
}
