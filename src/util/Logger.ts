import axios from 'axios'
import chalk from 'chalk'

import { DISCORD } from '../constants'
import type { ConfigLogging, ConfigWebhook } from '../interface/Config'

const DEFAULT_LIVE_LOG_USERNAME = 'Check-in - Live Logs'

export type LogLevel = 'log' | 'warn' | 'error'

export type LogColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'gray'

/**
 * Logger handed to every component. Returns an Error when type === 'error' so callers can `throw log(...)`.
 *
 * scope: 'main' for the runner, otherwise the account label
 * title: short title/category of the log (used for exclusion checks)
 */
export type Logger = (
    scope: string,
    title: string,
    message: string,
    type?: LogLevel,
    color?: LogColor
) => Error | void

export interface LoggerOptions {
    logging?: Partial<ConfigLogging>;
    webhook?: ConfigWebhook;
}

type WebhookBuffer = {
    lines: string[]
    sending: boolean
    timer?: NodeJS.Timeout
    username: string
    avatarUrl: string
}

const webhookBuffers = new Map<string, WebhookBuffer>()

function getBuffer(url: string, webhook?: ConfigWebhook): WebhookBuffer {
    let buf = webhookBuffers.get(url)
    if (!buf) {
        buf = {
            lines: [],
            sending: false,
            username: webhook?.username || DEFAULT_LIVE_LOG_USERNAME,
            avatarUrl: webhook?.avatarUrl || DISCORD.AVATAR_URL
        }
        webhookBuffers.set(url, buf)
    }
    return buf
}

async function sendBatch(url: string, buf: WebhookBuffer) {
    if (buf.sending) return
    buf.sending = true

    while (buf.lines.length > 0) {
        const chunk: string[] = []
        let currentLength = 0
        while (buf.lines.length > 0) {
            const next = buf.lines[0] ?? ''
            const projected = currentLength + next.length + (chunk.length > 0 ? 1 : 0)
            if (projected > DISCORD.MAX_EMBED_LENGTH && chunk.length > 0) break
            buf.lines.shift()
            chunk.push(next)
            currentLength = projected
        }

        const content = chunk.join('\n').slice(0, DISCORD.MAX_EMBED_LENGTH)
        if (!content) continue

        const payload = {
            username: buf.username,
            avatar_url: buf.avatarUrl || undefined,
            embeds: [{
                description: `\`\`\`\n${content}\n\`\`\``,
                color: determineColorFromContent(content),
                timestamp: new Date().toISOString()
            }]
        }

        try {
            await axios.post(url, payload, { headers: { 'Content-Type': 'application/json' }, timeout: DISCORD.WEBHOOK_TIMEOUT })
            await new Promise(resolve => setTimeout(resolve, DISCORD.RATE_LIMIT_DELAY))
        } catch (error) {
            // Failed batch is dropped
            console.error('[Webhook] live log delivery failed:', error instanceof Error ? error.message : error)
            break
        }
    }

    buf.sending = false
}

export function determineColorFromContent(content: string): number {
    const lower = content.toLowerCase()
    if (lower.includes('[error]') || lower.includes('✗')) {
        return DISCORD.COLOR_CRIMSON
    }
    if (lower.includes('[warn]') || lower.includes('⚠')) {
        return DISCORD.COLOR_ORANGE
    }
    if (lower.includes('[ok]') || lower.includes('✓') || lower.includes('complet')) {
        return DISCORD.COLOR_GREEN
    }
    if (lower.includes('[main]')) {
        return DISCORD.COLOR_BLUE
    }
    return 0x95A5A6 // Gray
}

function enqueueWebhookLog(url: string, line: string, webhook?: ConfigWebhook) {
    const buf = getBuffer(url, webhook)
    buf.lines.push(line)
    // debounce sending to batch multiple short-lived logs
    if (!buf.timer) {
        buf.timer = setTimeout(() => {
            buf.timer = undefined
            void sendBatch(url, buf)
        }, DISCORD.DEBOUNCE_DELAY)
    }
}

/** Send whatever the live webhook buffers still hold. Call before exiting. */
export async function flushLiveLogs(): Promise<void> {
    for (const [url, buf] of webhookBuffers.entries()) {
        if (buf.timer) {
            clearTimeout(buf.timer)
            buf.timer = undefined
        }
        await sendBatch(url, buf)
    }
}

export function redactEmails(text: string): string {
    return text.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/ig, (m) => {
        const [u, d] = m.split('@')
        return `${(u || '').slice(0, 2)}***@${d || ''}`
    })
}

const ICON_MAP: Array<[RegExp, string]> = [
    [/error|fail/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/success|complet/i, '[OK]'],
    [/login|auth/i, '[LOGIN]'],
    [/check-?in/i, '[CHECKIN]'],
    [/quota|token|balance/i, '[QUOTA]'],
    [/retry|round/i, '[RETRY]'],
    [/browser|driver|session/i, '[BROWSER]'],
    [/report|notify/i, '[REPORT]'],
    [/main/i, '[MAIN]']
]

export function createLogger(options: LoggerOptions = {}): Logger {
    const loggingCfg = options.logging ?? {}
    const excluded = (loggingCfg.excludeFunc ?? []).map(x => x.toLowerCase())
    const webhookExcluded = (loggingCfg.webhookExcludeFunc ?? []).map(x => x.toLowerCase())
    const shouldRedact = !!loggingCfg.redactEmails
    const redact = (s: string) => shouldRedact ? redactEmails(s) : s

    const webhookCfg = options.webhook
    const liveUrlRaw = typeof loggingCfg.liveWebhookUrl === 'string' ? loggingCfg.liveWebhookUrl.trim() : ''
    const liveUrl = liveUrlRaw || (webhookCfg?.enabled && webhookCfg.url ? webhookCfg.url : '')

    return function log(scope, title, message, type = 'log', color) {
        const titleLower = title.toLowerCase()
        if (excluded.includes(titleLower)) {
            return type === 'error' ? new Error(message) : undefined
        }

        const currentTime = new Date().toLocaleString()
        const scopeText = scope === 'main' ? 'MAIN' : scope
        const cleanStr = redact(`[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${scopeText} [${title}] ${message}`)

        // Console formatting & icons
        const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : '✓'
        const scopeColor = scope === 'main' ? chalk.cyan : chalk.magenta
        const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : chalk.green

        let icon = ''
        for (const [pattern, symbol] of ICON_MAP) {
            if (pattern.test(titleLower)) {
                icon = chalk.dim(symbol)
                break
            }
        }
        const iconPart = icon ? icon + ' ' : ''

        const formattedStr = [
            chalk.gray(`[${currentTime}]`),
            chalk.gray(`[${process.pid}]`),
            typeColor(typeIndicator),
            scopeColor(`[${redact(scopeText)}]`),
            chalk.bold(`[${title}]`),
            iconPart + redact(message)
        ].join(' ')

        const line = color ? chalk[color](formattedStr) : formattedStr

        switch (type) {
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
            default:
                console.log(line)
                break
        }

        // Live webhook streaming (batched)
        if (liveUrl && !webhookExcluded.includes(titleLower)) {
            enqueueWebhookLog(liveUrl, cleanStr, webhookCfg)
        }

        if (type === 'error') {
            return new Error(cleanStr)
        }
    }
}

/** Logger that discards everything */
export const silentLogger: Logger = (_scope, _title, message, type) => {
    if (type === 'error') return new Error(message)
}
