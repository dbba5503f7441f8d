import fs from 'fs'
import path from 'path'

import { MAX_RETRY_DELAY_HOURS, PLACEHOLDER_MARKERS } from '../constants'
import type { Account, AccountProxy } from '../interface/Account'
import type {
    Config,
    ConfigDiagnostics,
    ConfigLogging,
    ConfigNtfy,
    ConfigReport,
    ConfigSettings,
    ConfigWebhook,
    DriverKind
} from '../interface/Config'
import type { SiteOverrides } from '../interface/Site'
import type { SessionBlob, SessionStore } from '../interface/SessionDriver'
import { ConfigurationError, errorMessage } from './Errors'
import { resolveSite } from './Site'
import { isRecord } from './Utils'

const DEFAULT_CONFIG_NAMES = ['accounts.jsonc', 'accounts.json']

// Basic JSON comment stripper (supports // line and /* block */ comments while preserving strings)
export function stripJsonComments(input: string): string {
    let out = ''
    let inString = false
    let stringChar = ''
    let inLine = false
    let inBlock = false
    for (let i = 0; i < input.length; i++) {
        const ch = input[i] ?? ''
        const next = input[i + 1]
        if (inLine) {
            if (ch === '\n' || ch === '\r') {
                inLine = false
                out += ch
            }
            continue
        }
        if (inBlock) {
            if (ch === '*' && next === '/') {
                inBlock = false
                i++
            }
            continue
        }
        if (inString) {
            out += ch
            if (ch === '\\') { // escape next char
                i++
                if (i < input.length) out += input[i]
                continue
            }
            if (ch === stringChar) {
                inString = false
            }
            continue
        }
        if (ch === '"' || ch === '\'') {
            inString = true
            stringChar = ch
            out += ch
            continue
        }
        if (ch === '/' && next === '/') {
            inLine = true
            i++
            continue
        }
        if (ch === '/' && next === '*') {
            inBlock = true
            i++
            continue
        }
        out += ch
    }
    return out
}

function str(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

function num(value: unknown, fallback: number): number {
    const n = typeof value === 'string' ? Number(value.trim()) : value
    return typeof n === 'number' && Number.isFinite(n) ? n : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
    if (typeof value === 'boolean') return value
    if (typeof value === 'string') {
        const v = value.trim().toLowerCase()
        if (['1', 'true', 'yes', 'on'].includes(v)) return true
        if (['0', 'false', 'no', 'off'].includes(v)) return false
    }
    return fallback
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((x): x is string => typeof x === 'string') : []
}

function record(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {}
}

function parseProxy(value: unknown): string | AccountProxy | undefined {
    const asString = str(value)
    if (asString) return asString
    if (!isRecord(value)) return undefined
    const url = str(value.url)
    if (!url) return undefined
    const proxy: AccountProxy = { url }
    const port = num(value.port, NaN)
    if (Number.isFinite(port)) proxy.port = port
    const username = str(value.username)
    if (username) proxy.username = username
    if (typeof value.password === 'string') proxy.password = value.password
    return proxy
}

function parseSiteOverrides(value: unknown): SiteOverrides {
    const src = record(value)
    const out: SiteOverrides = {}
    const textFields = [
        'name', 'baseUrl', 'loginPath', 'consolePath', 'checkinApiPath', 'userApiPath',
        'tokensApiPath', 'authMode', 'oauthEntryPath', 'oauthButtonLabel', 'savedSessionPath'
    ] as const
    for (const field of textFields) {
        const v = src[field]
        if (typeof v === 'string') out[field] = v
    }
    // snake_case spelling of the legacy flat configs
    if (out.baseUrl === undefined && typeof src.base_url === 'string') out.baseUrl = src.base_url
    const timeout = src.manualAuthTimeoutSeconds ?? src.manual_auth_timeout_seconds
    if (typeof timeout === 'number' || typeof timeout === 'string') out.manualAuthTimeoutSeconds = timeout
    return out
}

export function parseAccount(raw: unknown): Account | null {
    if (!isRecord(raw)) return null

    const account: Account = {
        ...parseSiteOverrides(raw),
        username: typeof raw.username === 'string' ? raw.username : ''
    }
    if (typeof raw.password === 'string') account.password = raw.password
    if (typeof raw.enabled === 'boolean') account.enabled = raw.enabled
    if (isRecord(raw.site)) account.site = parseSiteOverrides(raw.site)

    const proxy = parseProxy(raw.proxy)
    if (proxy) account.proxy = proxy

    const remote = str(raw.remoteDebugEndpoint ?? raw.remote_debug_endpoint)
    if (remote) account.remoteDebugEndpoint = remote

    return account
}

function parseWebhook(value: unknown): ConfigWebhook {
    const src = record(value)
    const webhook: ConfigWebhook = { enabled: bool(src.enabled, false), url: str(src.url) ?? '' }
    const username = str(src.username)
    if (username) webhook.username = username
    const avatarUrl = str(src.avatarUrl)
    if (avatarUrl) webhook.avatarUrl = avatarUrl
    return webhook
}

function parseNtfy(value: unknown): ConfigNtfy {
    const src = record(value)
    const ntfy: ConfigNtfy = {
        enabled: bool(src.enabled, false),
        url: str(src.url) ?? '',
        topic: str(src.topic) ?? ''
    }
    const authToken = str(src.authToken)
    if (authToken) ntfy.authToken = authToken
    return ntfy
}

function parseDriver(value: unknown): DriverKind {
    return str(value)?.toLowerCase() === 'http' ? 'http' : 'browser'
}

// Normalize both legacy (snake_case, flat) and current (camelCase, nested) schemas into ConfigSettings
export function normalizeSettings(raw: unknown): ConfigSettings {
    const n = record(raw)
    const notifications = record(n.notifications)
    const loggingSrc = record(n.logging)
    const reportSrc = record(n.report)
    const diagnosticsSrc = record(n.diagnostics)

    let minDelay = Math.max(0, num(n.minDelay ?? n.min_delay, 60))
    let maxDelay = Math.max(0, num(n.maxDelay ?? n.max_delay, 180))
    if (maxDelay < minDelay) [minDelay, maxDelay] = [maxDelay, minDelay]

    const logging: ConfigLogging = {
        excludeFunc: stringList(loggingSrc.excludeFunc),
        webhookExcludeFunc: stringList(loggingSrc.webhookExcludeFunc),
        redactEmails: bool(loggingSrc.redactEmails, false)
    }
    const liveWebhookUrl = str(loggingSrc.liveWebhookUrl)
    if (liveWebhookUrl) logging.liveWebhookUrl = liveWebhookUrl

    const report: ConfigReport = {
        dir: str(reportSrc.dir) ?? 'reports',
        json: bool(reportSrc.json, true),
        csv: bool(reportSrc.csv, true),
        text: bool(reportSrc.text, true)
    }

    const diagnostics: ConfigDiagnostics = {
        enabled: bool(diagnosticsSrc.enabled, true),
        dir: str(diagnosticsSrc.dir) ?? 'diagnostics'
    }

    let retryDelayHours = Math.max(0, num(n.retryDelayHours ?? n.retry_delay_hours, 1))
    if (retryDelayHours > MAX_RETRY_DELAY_HOURS) {
        console.warn(`[WARN] retryDelayHours=${retryDelayHours} is above the ${MAX_RETRY_DELAY_HOURS}h limit, using ${MAX_RETRY_DELAY_HOURS}`)
        retryDelayHours = MAX_RETRY_DELAY_HOURS
    }

    const settings: ConfigSettings = {
        minDelay,
        maxDelay,
        headless: bool(n.headless ?? record(n.browser).headless, true),
        driver: parseDriver(n.driver),
        globalTimeout: typeof n.globalTimeout === 'number' || typeof n.globalTimeout === 'string' ? n.globalTimeout : '30s',
        maxRetries: Math.max(0, Math.trunc(num(n.maxRetries ?? n.max_retries, 2))),
        retryDelayHours,
        site: parseSiteOverrides(n.site),
        logging,
        report,
        diagnostics,
        webhook: parseWebhook(notifications.webhook ?? n.webhook),
        conclusionWebhook: parseWebhook(notifications.conclusionWebhook ?? n.conclusionWebhook),
        ntfy: parseNtfy(notifications.ntfy ?? n.ntfy),
        dryRun: bool(n.dryRun, false)
    }

    const proxy = str(n.proxy)
    if (proxy) settings.proxy = proxy
    const baseUrl = str(n.baseUrl ?? n.base_url)
    if (baseUrl) settings.baseUrl = baseUrl
    const remote = str(n.remoteDebugEndpoint ?? n.remote_debug_endpoint)
    if (remote) settings.remoteDebugEndpoint = remote

    return settings
}

/** Accept either a root array of accounts or `{ accounts, settings }` */
export function normalizeConfig(raw: unknown): Config {
    if (Array.isArray(raw)) {
        return { accounts: raw.map(parseAccount).filter((a): a is Account => a !== null), settings: normalizeSettings({}) }
    }
    const n = record(raw)
    const accountsRaw = Array.isArray(n.accounts) ? n.accounts : []
    return {
        accounts: accountsRaw.map(parseAccount).filter((a): a is Account => a !== null),
        settings: normalizeSettings(n.settings)
    }
}

export function parseConfigText(text: string): unknown {
    return JSON.parse(stripJsonComments(text.replace(/^\uFEFF/, ''))) // strip BOM if present
}

/**
 * Config file location: `-c <file>` / `--config <file>`, then CHECKIN_CONFIG, then the first
 * existing accounts.json(c) under ./config or the working directory.
 */
export function resolveConfigPath(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): string {
    const idx = argv.findIndex(a => a === '-c' || a === '--config')
    const fromArgs = idx >= 0 ? argv[idx + 1] : undefined
    const explicit = fromArgs || env.CHECKIN_CONFIG
    if (explicit) return path.resolve(explicit)

    const bases = [path.join(process.cwd(), 'config'), process.cwd()]
    const candidates: string[] = []
    for (const base of bases) {
        for (const name of DEFAULT_CONFIG_NAMES) {
            candidates.push(path.join(base, name))
        }
    }
    return candidates.find(p => fs.existsSync(p)) ?? path.join(process.cwd(), 'config', 'accounts.json')
}

/**
 * Read and normalize the config file, then apply env overrides:
 * ACCOUNTS_JSON (raw account array), HEADLESS, CHECKIN_DRIVER.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Config {
    if (!fs.existsSync(configPath)) {
        throw new ConfigurationError(`config file not found: ${configPath}`)
    }

    let raw: unknown
    try {
        raw = parseConfigText(fs.readFileSync(configPath, 'utf-8'))
    } catch (error) {
        throw new ConfigurationError(`failed to parse ${configPath}: ${errorMessage(error)}`, { cause: error })
    }

    const config = normalizeConfig(raw)

    const envJson = env.ACCOUNTS_JSON
    if (envJson && envJson.trim().startsWith('[')) {
        try {
            config.accounts = normalizeConfig(parseConfigText(envJson)).accounts
        } catch (error) {
            throw new ConfigurationError(`ACCOUNTS_JSON is not valid JSON: ${errorMessage(error)}`, { cause: error })
        }
    }
    if (env.HEADLESS !== undefined) config.settings.headless = bool(env.HEADLESS, config.settings.headless)
    if (env.CHECKIN_DRIVER) config.settings.driver = parseDriver(env.CHECKIN_DRIVER)

    return config
}

export function isPlaceholder(value: string): boolean {
    const lower = value.toLowerCase()
    return PLACEHOLDER_MARKERS.some(marker => lower.includes(marker))
}

/**
 * Valid = enabled, a real-looking username, and (for local login) a real-looking password.
 * oauthDelegate accounts need no password.
 */
export function isValidAccount(account: Account, settings: Pick<ConfigSettings, 'site' | 'baseUrl'>): boolean {
    if (account.enabled === false) return false
    const username = account.username.trim()
    if (!username || isPlaceholder(username)) return false

    if (resolveSite(settings, account).authMode !== 'local') return true
    const password = (account.password ?? '').trim()
    return !!password && !isPlaceholder(password)
}

export function filterAccounts(accounts: Account[], settings: Pick<ConfigSettings, 'site' | 'baseUrl'>): { valid: Account[], skipped: string[] } {
    const valid: Account[] = []
    const skipped: string[] = []
    for (const account of accounts) {
        if (isValidAccount(account, settings)) valid.push(account)
        else skipped.push(account.username.trim() || '(empty)')
    }
    return { valid, skipped }
}

/** Saved session blobs as JSON files */
export class FileSessionStore implements SessionStore {

    async load(location: string): Promise<SessionBlob | null> {
        if (!fs.existsSync(location)) return null
        const data = await fs.promises.readFile(location, 'utf-8')
        const parsed: unknown = JSON.parse(data)
        return isRecord(parsed) ? parsed : null
    }

    async save(location: string, blob: SessionBlob): Promise<void> {
        const dir = path.dirname(location)
        if (!fs.existsSync(dir)) {
            await fs.promises.mkdir(dir, { recursive: true })
        }
        await fs.promises.writeFile(location, JSON.stringify(blob), 'utf-8')
    }
}
