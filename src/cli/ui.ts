import chalk from "chalk"

export const colors = {
    success: chalk.green,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
    muted: chalk.gray,
    emphasis: chalk.bold,
}

export const symbols = {
    success: colors.success("✓"),
    error: colors.error("✗"),
    warning: colors.warn("!"),
    bullet: colors.muted("•"),
}

export function success(message: string): string {
    return `${symbols.success} ${colors.success(message)}`
}

export function failure(message: string): string {
    return `${symbols.error} ${colors.error(message)}`
}

export function warning(message: string): string {
    return `${symbols.warning} ${colors.warn(message)}`
}

export function info(message: string): string {
    return colors.info(message)
}

/**
 * Format bytes as human-readable string.
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`
    const units = ["KB", "MB", "GB", "TB"]
    let value = bytes / 1024
    let unit = 0
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024
        unit++
    }
    return `${value.toFixed(2)} ${units[unit]}`
}

export function formatVersionNumber(number: number): string {
    return `v${String(number).padStart(3, "0")}`
}

export function formatDate(iso: string): string {
    const date = new Date(iso)
    if (Number.isNaN(date.getTime())) return iso
    return date.toISOString().replace("T", " ").slice(0, 19)
}
