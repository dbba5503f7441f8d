export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export default class Util {

    async wait(ms: number): Promise<void> {
        // Waits are capped at one week
        const MAX_WAIT_MS = 7 * 24 * 3600000
        const safeMs = Math.min(Math.max(0, ms), MAX_WAIT_MS)

        return new Promise<void>((resolve) => {
            setTimeout(resolve, safeMs)
        })
    }

    now(): number {
        return Date.now()
    }

    getFormattedDate(ms = Date.now()): string {
        const today = new Date(ms)
        const month = String(today.getMonth() + 1).padStart(2, '0')
        const day = String(today.getDate()).padStart(2, '0')
        const year = today.getFullYear()

        return `${year}-${month}-${day}`
    }

    /** Integer in [min, max], swapped when given in the wrong order */
    randomNumber(min: number, max: number): number {
        if (min > max) [min, max] = [max, min]
        return Math.floor(Math.random() * (max - min + 1)) + min
    }

    /**
     * Accepts a number (ms) or strings like "500ms", "30s", "5min", "2h".
     * Bare numeric strings are milliseconds.
     */
    stringToMs(input: string | number): number {
        if (typeof input === 'number') {
            if (!Number.isFinite(input)) throw new Error('Invalid time value: ' + input)
            return input
        }
        const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|sec|min|m|h)?\s*$/i.exec(input)
        if (!match || match[1] === undefined) throw new Error('Invalid time string: ' + input)

        const value = parseFloat(match[1])
        const unit = (match[2] ?? 'ms').toLowerCase()
        const factor: Record<string, number> = {
            ms: 1,
            s: 1000,
            sec: 1000,
            m: 60000,
            min: 60000,
            h: 3600000
        }
        return Math.round(value * (factor[unit] ?? 1))
    }
}
