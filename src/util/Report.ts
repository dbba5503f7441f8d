import fs from 'fs'
import path from 'path'

import type { ConfigReport } from '../interface/Config'
import type { AccountResult, RunSummary } from '../interface/Result'
import type { Logger } from './Logger'
import { errorMessage } from './Errors'
import Util from './Utils'

/** Output sink for the final, merged results of a run */
export interface Reporter {
    report(results: AccountResult[], summary: RunSummary): Promise<void>;
}

export function summarize(results: AccountResult[], runId: string): RunSummary {
    const failed = results.filter(r => !r.success)
    return {
        runId,
        total: results.length,
        succeeded: results.length - failed.length,
        failed: failed.length,
        failedLabels: failed.map(r => r.label),
        quotaGained: results.reduce((sum, r) => sum + (r.success ? r.quotaDelta : 0), 0)
    }
}

/** First four characters, the rest hidden */
export function maskKey(key: string): string {
    return key.length > 4 ? `${key.slice(0, 4)}****` : '****'
}

/** Results as written to disk: token keys masked */
export function redactResults(results: AccountResult[]): AccountResult[] {
    return results.map(result => ({
        ...result,
        tokens: result.tokens.map(token => ({ ...token, key: token.key ? maskKey(token.key) : '' }))
    }))
}

const CSV_COLUMNS = [
    'label', 'username', 'site', 'baseUrl', 'authMode', 'success', 'checkin', 'userId',
    'quotaBefore', 'quotaRemaining', 'quotaDelta', 'tokenCount', 'state', 'errorKind',
    'message', 'attempt', 'durationMs', 'finishedAt'
] as const

type CsvColumn = typeof CSV_COLUMNS[number]

function csvField(value: string | number | boolean | undefined): string {
    if (value === undefined) return ''
    const text = String(value)
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

function csvRow(result: AccountResult): string {
    const row: Record<CsvColumn, string | number | boolean | undefined> = {
        label: result.label,
        username: result.username,
        site: result.site,
        baseUrl: result.baseUrl,
        authMode: result.authMode,
        success: result.success,
        checkin: result.checkin,
        userId: result.userId,
        quotaBefore: result.quotaBefore,
        quotaRemaining: result.quotaRemaining,
        quotaDelta: result.quotaDelta,
        tokenCount: result.tokens.length,
        state: result.state,
        errorKind: result.errorKind,
        message: result.message,
        attempt: result.attempt,
        durationMs: result.durationMs,
        finishedAt: result.finishedAt
    }
    return CSV_COLUMNS.map(column => csvField(row[column])).join(',')
}

/** RFC 4180: CRLF line breaks, quoted fields when they hold a comma, quote or newline */
export function toCsv(results: AccountResult[]): string {
    return [CSV_COLUMNS.join(','), ...results.map(csvRow)].join('\r\n') + '\r\n'
}

export function toText(results: AccountResult[], summary: RunSummary): string {
    const lines = [
        `Check-in run ${summary.runId}`,
        `Total: ${summary.total}  Succeeded: ${summary.succeeded}  Failed: ${summary.failed}  Quota gained: ${summary.quotaGained}`,
        ''
    ]
    for (const r of results) {
        if (r.success) {
            const delta = r.quotaDelta > 0 ? ` (+${r.quotaDelta})` : ''
            lines.push(`[OK]   ${r.label} - ${r.checkin} - quota ${r.quotaRemaining}${delta}`)
        } else {
            lines.push(`[FAIL] ${r.label} - ${r.errorKind ?? 'Error'}: ${r.message}`)
        }
    }
    if (summary.failedLabels.length > 0) {
        lines.push('', `Failed accounts: ${summary.failedLabels.join(', ')}`)
    }
    return lines.join('\n') + '\n'
}

/** Writes `<dir>/<YYYY-MM-DD>/checkin_<runId>.{json,csv,txt}` */
export class FileReporter implements Reporter {
    /** Paths written by the last `report` call */
    public written: string[] = []

    constructor(
        private readonly settings: ConfigReport,
        private readonly log: Logger,
        private readonly utils: Util = new Util()
    ) { }

    async report(results: AccountResult[], summary: RunSummary): Promise<void> {
        this.written = []
        const outputs: Array<[boolean, string, () => string]> = [
            [this.settings.json, 'json', () => JSON.stringify({ summary, results: redactResults(results) }, null, 2)],
            [this.settings.csv, 'csv', () => toCsv(results)],
            [this.settings.text, 'txt', () => toText(results, summary)]
        ]
        if (!outputs.some(([enabled]) => enabled)) return

        const baseDir = path.resolve(this.settings.dir, this.utils.getFormattedDate(this.utils.now()))
        await fs.promises.mkdir(baseDir, { recursive: true })

        for (const [enabled, ext, render] of outputs) {
            if (!enabled) continue
            const file = path.join(baseDir, `checkin_${summary.runId}.${ext}`)
            await fs.promises.writeFile(file, render(), 'utf-8')
            this.written.push(file)
            this.log('main', 'REPORT', `Saved ${ext} report to ${file}`)
        }
    }
}

/** Runs every sink in order. A failing sink is logged and the rest still run. */
export class ReportDispatcher implements Reporter {
    constructor(
        private readonly reporters: Reporter[],
        private readonly log: Logger
    ) { }

    async report(results: AccountResult[], summary: RunSummary): Promise<void> {
        for (const reporter of this.reporters) {
            try {
                await reporter.report(results, summary)
            } catch (error) {
                this.log('main', 'REPORT', `Report sink ${reporter.constructor.name} failed: ${errorMessage(error)}`, 'warn')
            }
        }
    }
}
