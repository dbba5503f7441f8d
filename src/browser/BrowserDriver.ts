import fs from 'fs'
import path from 'path'
import type { BrowserContext } from 'rebrowser-playwright'

import { TIMEOUTS } from '../constants'
import type {
    ActionOutcome,
    ElementAction,
    HttpMethod,
    OpenOptions,
    SessionBlob,
    SessionDriver,
    WaitCondition
} from '../interface/SessionDriver'
import type { SiteDescriptor } from '../interface/Site'
import { errorMessage } from '../util/Errors'
import type { Logger } from '../util/Logger'
import { readApiOutcome } from '../util/Tokens'
import Util, { isRecord } from '../util/Utils'
import Browser from './Browser'
import type { BrowserOptions, BrowserSession } from './Browser'
import BrowserUtil, { diagnosticsBasePath, extractPageText } from './BrowserUtil'

type StorageCookie = Parameters<BrowserContext['addCookies']>[0][number]

interface StorageOrigin {
    origin: string;
    localStorage: Array<{ name: string; value: string }>;
}

function toCookies(value: unknown): StorageCookie[] {
    if (!Array.isArray(value)) return []
    const cookies: StorageCookie[] = []
    for (const raw of value) {
        if (!isRecord(raw) || typeof raw.name !== 'string' || typeof raw.value !== 'string') continue
        const cookie: StorageCookie = { name: raw.name, value: raw.value }
        if (typeof raw.domain === 'string') {
            cookie.domain = raw.domain
            cookie.path = typeof raw.path === 'string' ? raw.path : '/'
        } else if (typeof raw.url === 'string') {
            cookie.url = raw.url
        } else {
            continue
        }
        if (typeof raw.expires === 'number') cookie.expires = raw.expires
        if (typeof raw.httpOnly === 'boolean') cookie.httpOnly = raw.httpOnly
        if (typeof raw.secure === 'boolean') cookie.secure = raw.secure
        if (raw.sameSite === 'Strict' || raw.sameSite === 'Lax' || raw.sameSite === 'None') cookie.sameSite = raw.sameSite
        cookies.push(cookie)
    }
    return cookies
}

function toOrigins(value: unknown): StorageOrigin[] {
    if (!Array.isArray(value)) return []
    const origins: StorageOrigin[] = []
    for (const raw of value) {
        if (!isRecord(raw) || typeof raw.origin !== 'string' || !Array.isArray(raw.localStorage)) continue
        const items = raw.localStorage.flatMap((item: unknown) =>
            isRecord(item) && typeof item.name === 'string' && typeof item.value === 'string'
                ? [{ name: item.name, value: item.value }]
                : [])
        origins.push({ origin: raw.origin, localStorage: items })
    }
    return origins
}

function parseBody(text: string): unknown {
    try {
        return JSON.parse(text)
    } catch {
        return text
    }
}

/** SessionDriver backed by a Chromium page */
export class PlaywrightDriver implements SessionDriver<BrowserSession> {
    readonly headless: boolean
    private browser: Browser
    private browserUtil: BrowserUtil

    constructor(private readonly options: BrowserOptions, private readonly log: Logger, private readonly utils: Util = new Util()) {
        this.headless = options.headless
        this.browser = new Browser(options, log, utils)
        this.browserUtil = new BrowserUtil(log)
    }

    open(site: SiteDescriptor, options: OpenOptions): Promise<BrowserSession> {
        return this.browser.createSession(site, options)
    }

    async navigate(session: BrowserSession, url: string, waitUntil: WaitCondition = 'domcontentloaded'): Promise<void> {
        await session.page.goto(url, { waitUntil, timeout: TIMEOUTS.NAVIGATION })
        await this.browserUtil.reloadBadPage(session.page, session.scope)
        await this.browserUtil.dismissModals(session.page, session.scope)
    }

    async currentUrl(session: BrowserSession): Promise<string> {
        return session.page.url()
    }

    async fill(session: BrowserSession, selectors: readonly string[], value: string): Promise<boolean> {
        for (const selector of selectors) {
            const input = session.page.locator(selector).first()
            if (!(await input.isVisible().catch(() => false))) continue
            await input.fill(value)
            return true
        }
        return false
    }

    async findAndAct(session: BrowserSession, selectors: readonly string[], action: ElementAction): Promise<ActionOutcome> {
        await this.browserUtil.dismissModals(session.page, session.scope)

        for (const selector of selectors) {
            const element = session.page.locator(selector).first()
            if (!(await element.isVisible().catch(() => false))) continue

            const enabled = await element.isEnabled().catch(() => false)
            const label = (await element.innerText({ timeout: TIMEOUTS.ELEMENT_VISIBLE }).catch(() => '')).trim()
            if (action === 'inspect' || !enabled) {
                return { found: true, enabled, label, acted: false }
            }

            const acted = await element.click({ timeout: TIMEOUTS.ELEMENT_VISIBLE }).then(() => true, (e: unknown) => {
                this.log(session.scope, 'BROWSER', `Click on ${selector} failed: ${errorMessage(e)}`, 'warn')
                return false
            })
            return { found: true, enabled, label, acted }
        }
        return { found: false, enabled: false, label: '', acted: false }
    }

    async press(session: BrowserSession, key: string): Promise<void> {
        await session.page.keyboard.press(key)
    }

    async pageText(session: BrowserSession): Promise<string> {
        return extractPageText(await session.page.content())
    }

    async evaluateAuthenticated(session: BrowserSession, probeUrl: string): Promise<boolean> {
        return readApiOutcome(await this.callApiInPage(session, probeUrl, 'GET')).success
    }

    /** fetch() from inside the page so the site's cookies and origin apply */
    async callApiInPage(session: BrowserSession, url: string, method: HttpMethod, body?: unknown, headers: Record<string, string> = {}): Promise<unknown> {
        const payload = body === undefined ? undefined : JSON.stringify(body)
        const text = await session.page.evaluate(async (req) => {
            const response = await fetch(req.url, {
                method: req.method,
                credentials: 'include',
                headers: { 'Content-Type': 'application/json', ...req.headers },
                body: req.payload
            })
            return response.text()
        }, { url, method, headers, payload })
        return parseBody(text)
    }

    async saveSessionState(session: BrowserSession): Promise<SessionBlob> {
        const state = await session.context.storageState()
        return { cookies: state.cookies, origins: state.origins }
    }

    async restoreSessionState(session: BrowserSession, blob: SessionBlob): Promise<BrowserSession> {
        const cookies = toCookies(blob.cookies)
        if (cookies.length > 0) await session.context.addCookies(cookies)

        const origins = toOrigins(blob.origins)
        if (origins.length > 0) {
            // runs before any page script on every navigation
            await session.context.addInitScript({
                content: `(() => {
                    const origins = ${JSON.stringify(origins)};
                    const entry = origins.find(o => o.origin === location.origin);
                    if (entry) for (const item of entry.localStorage) localStorage.setItem(item.name, item.value);
                })()`
            })
        }
        return session
    }

    /** Screenshot and HTML of the current page; a no-op without a diagnostics directory */
    async captureDiagnostics(session: BrowserSession, name: string): Promise<void> {
        const dir = this.options.diagnosticsDir
        if (!dir || session.page.isClosed()) return

        const base = diagnosticsBasePath(dir, name, new Date(this.utils.now()))
        await fs.promises.mkdir(path.dirname(base), { recursive: true })
        await session.page.screenshot({ path: `${base}.png`, fullPage: true })
        await fs.promises.writeFile(`${base}.html`, await session.page.content(), 'utf-8')
        this.log(session.scope, 'BROWSER', `Saved diagnostics to ${base}.png`)
    }

    close(session: BrowserSession): Promise<void> {
        return this.browser.closeSession(session)
    }
}
