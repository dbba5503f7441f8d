import type { AxiosResponse } from 'axios'

import type {
    ActionOutcome,
    HttpMethod,
    OpenOptions,
    SessionBlob,
    SessionDriver,
    WaitCondition
} from '../interface/SessionDriver'
import type { SiteDescriptor } from '../interface/Site'
import AxiosClient from '../util/Axios'
import type { Logger } from '../util/Logger'
import { siteUrl } from '../util/Site'
import { normalizeUserInfo, readApiOutcome } from '../util/Tokens'
import { isRecord } from '../util/Utils'
import { extractPageText } from './BrowserUtil'

const LOGIN_API_PATH = '/api/user/login?turnstile='

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36'

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8'
const JSON_ACCEPT = 'application/json, text/plain, */*'

export interface HttpSession {
    site: SiteDescriptor;
    client: AxiosClient;
    cookies: Map<string, string>;
    /** -1 until logged in, sent as the New-Api-User header */
    userId: number;
    url: string;
    text: string;
    /** Values typed into the login form, keyed by input name */
    form: Map<string, string>;
}

/** Input name targeted by a selector list, e.g. `input[name="password"]` -> password */
function fieldName(selectors: readonly string[]): string | null {
    for (const selector of selectors) {
        const match = /name="([^"]+)"/.exec(selector) ?? /type="(password)"/.exec(selector)
        if (match?.[1]) return match[1]
    }
    return null
}

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data
    if (data === undefined || data === null) return ''
    return JSON.stringify(data)
}

function parseBody(data: unknown): unknown {
    if (typeof data !== 'string') return data
    try {
        return JSON.parse(data)
    } catch {
        return data
    }
}

/**
 * SessionDriver without a browser: the site's JSON API with a cookie jar. There is no DOM,
 * so element lookups find nothing and the workflow falls back to the APIs. Pressing Enter
 * submits the filled login form.
 */
export class HttpDriver implements SessionDriver<HttpSession> {
    readonly headless = true

    constructor(
        private readonly log: Logger,
        private readonly timeoutMs = 30000
    ) { }

    async open(site: SiteDescriptor, options: OpenOptions): Promise<HttpSession> {
        if (options.remoteDebugEndpoint) {
            this.log(site.name, 'DRIVER', 'remoteDebugEndpoint is ignored by the http driver', 'warn')
        }
        return {
            site,
            client: new AxiosClient(options.proxy, this.timeoutMs),
            cookies: new Map(),
            userId: -1,
            url: 'about:blank',
            text: '',
            form: new Map()
        }
    }

    private headers(session: HttpSession, accept: string, extra: Record<string, string> = {}): Record<string, string> {
        const headers: Record<string, string> = {
            'User-Agent': USER_AGENT,
            Accept: accept,
            'Accept-Language': 'zh-CN,zh;q=0.9,en-US;q=0.8,en;q=0.7',
            'Cache-Control': 'no-store',
            Origin: session.site.baseUrl,
            Referer: session.url.startsWith('http') ? session.url : siteUrl(session.site, session.site.loginPath),
            'New-Api-User': String(session.userId),
            ...extra
        }
        if (session.cookies.size > 0) {
            headers.Cookie = [...session.cookies].map(([name, value]) => `${name}=${value}`).join('; ')
        }
        return headers
    }

    private storeCookies(session: HttpSession, response: AxiosResponse<unknown>) {
        const raw: unknown = response.headers['set-cookie']
        const lines = Array.isArray(raw) ? raw.filter((l): l is string => typeof l === 'string') : (typeof raw === 'string' ? [raw] : [])
        for (const line of lines) {
            const pair = line.split(';')[0] ?? ''
            const eq = pair.indexOf('=')
            if (eq <= 0) continue
            session.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim())
        }
    }

    private async send(session: HttpSession, url: string, method: HttpMethod, accept: string, body?: unknown, extra?: Record<string, string>) {
        const response = await session.client.request<unknown>({
            url,
            method,
            data: body,
            headers: this.headers(session, accept, { ...(body === undefined ? {} : { 'Content-Type': 'application/json' }), ...extra }),
            // error bodies carry the site's message
            validateStatus: () => true,
            responseType: 'text',
            transformResponse: [(data: unknown) => data]
        })
        this.storeCookies(session, response)
        return response
    }

    /** GET the page; the login page visit collects the CDN cookies the API expects */
    async navigate(session: HttpSession, url: string, _waitUntil?: WaitCondition): Promise<void> {
        const response = await this.send(session, url, 'GET', HTML_ACCEPT)
        session.url = url
        session.text = extractPageText(bodyText(response.data))
        if (response.status >= 400) {
            this.log(session.site.name, 'DRIVER', `GET ${url} returned HTTP ${response.status}`, 'warn')
        }
    }

    async currentUrl(session: HttpSession): Promise<string> {
        return session.url
    }

    async fill(session: HttpSession, selectors: readonly string[], value: string): Promise<boolean> {
        const name = fieldName(selectors)
        if (!name) return false
        session.form.set(name, value)
        return true
    }

    async findAndAct(_session: HttpSession, _selectors: readonly string[], _action: string): Promise<ActionOutcome> {
        return { found: false, enabled: false, label: '', acted: false }
    }

    async press(session: HttpSession, key: string): Promise<void> {
        if (key !== 'Enter') return
        await this.submitLogin(session)
    }

    private async submitLogin(session: HttpSession): Promise<void> {
        const { site } = session
        const username = session.form.get('username') ?? ''
        const password = session.form.get('password') ?? ''

        const response = await this.send(session, siteUrl(site, LOGIN_API_PATH), 'POST', JSON_ACCEPT, { username, password })
        const payload = parseBody(response.data)
        const outcome = readApiOutcome(payload)

        if (!outcome.success) {
            session.text = outcome.message || `HTTP ${response.status}`
            this.log(site.name, 'DRIVER', `Login API refused: ${session.text}`, 'warn')
            return
        }

        const info = normalizeUserInfo(payload)
        if (info.userId !== undefined) session.userId = info.userId
        session.url = siteUrl(site, site.consolePath)
        session.text = ''
        session.form.clear()
    }

    async pageText(session: HttpSession): Promise<string> {
        return session.text
    }

    async evaluateAuthenticated(session: HttpSession, probeUrl: string): Promise<boolean> {
        const payload = await this.callApiInPage(session, probeUrl, 'GET')
        const authenticated = readApiOutcome(payload).success
        if (authenticated) {
            const info = normalizeUserInfo(payload)
            if (info.userId !== undefined) session.userId = info.userId
        }
        return authenticated
    }

    async callApiInPage(session: HttpSession, url: string, method: HttpMethod, body?: unknown, headers?: Record<string, string>): Promise<unknown> {
        const response = await this.send(session, url, method, JSON_ACCEPT, body, headers)
        return parseBody(response.data)
    }

    async saveSessionState(session: HttpSession): Promise<SessionBlob> {
        return { cookies: Object.fromEntries(session.cookies), userId: session.userId }
    }

    async restoreSessionState(session: HttpSession, blob: SessionBlob): Promise<HttpSession> {
        if (isRecord(blob.cookies)) {
            for (const [name, value] of Object.entries(blob.cookies)) {
                if (typeof value === 'string') session.cookies.set(name, value)
            }
        }
        if (typeof blob.userId === 'number' && Number.isInteger(blob.userId)) session.userId = blob.userId
        return session
    }

    async close(session: HttpSession): Promise<void> {
        session.cookies.clear()
        session.form.clear()
    }
}
