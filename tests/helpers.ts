import { SELECTORS } from '../src/constants'
import type {
    ActionOutcome,
    ElementAction,
    HttpMethod,
    OpenOptions,
    SessionBlob,
    SessionDriver,
    SessionStore
} from '../src/interface/SessionDriver'
import type { AccountResult } from '../src/interface/Result'
import type { SiteDescriptor } from '../src/interface/Site'
import type { LogLevel, Logger } from '../src/util/Logger'
import { siteUrl } from '../src/util/Site'
import Util from '../src/util/Utils'

/** Clock that only moves when something waits; random ranges always give their minimum */
export class FakeUtil extends Util {
    clock = Date.UTC(2026, 0, 15, 12, 0, 0)
    waits: number[] = []

    override async wait(ms: number): Promise<void> {
        this.waits.push(ms)
        this.clock += ms
    }

    override now(): number {
        return this.clock
    }

    override randomNumber(min: number, max: number): number {
        return Math.min(min, max)
    }
}

export interface LogEntry {
    scope: string;
    title: string;
    message: string;
    type: LogLevel;
}

export function recordingLogger(): { log: Logger, entries: LogEntry[] } {
    const entries: LogEntry[] = []
    const log: Logger = (scope, title, message, type = 'log') => {
        entries.push({ scope, title, message, type })
        if (type === 'error') return new Error(message)
    }
    return { log, entries }
}

export class MemorySessionStore implements SessionStore {
    blobs = new Map<string, SessionBlob>()

    async load(location: string): Promise<SessionBlob | null> {
        return this.blobs.get(location) ?? null
    }

    async save(location: string, blob: SessionBlob): Promise<void> {
        this.blobs.set(location, blob)
    }
}

export type FailurePoint = 'open' | 'navigate' | 'user:1' | 'user:2' | 'tokens' | 'checkin' | 'save' | 'diagnostics' | 'close'

export interface FakeScript {
    headless?: boolean;
    /** Clicking the login or OAuth button authenticates the session (default true) */
    loginSucceeds?: boolean;
    /** Login inputs accept values (default true) */
    fillAccepts?: boolean;
    /** A restored session blob is still valid */
    savedSessionValid?: boolean;
    /** Restoring hands back a freshly opened session instead of the given one */
    restoreOpensNew?: boolean;
    /** The login click only shows up in evaluateAuthenticated after this many polls */
    confirmAfterPolls?: number;
    /** The first pageText calls throw as if the page were navigating */
    navigatingReads?: number;
    pageText?: string;
    checkinButton?: ActionOutcome;
    /** One payload per user API call, the last one repeats */
    userInfo?: unknown[];
    tokens?: unknown;
    checkinResponse?: unknown;
    failOn?: FailurePoint[];
}

export interface FakeSession {
    id: number;
    site: SiteDescriptor;
    url: string;
    authenticated: boolean;
    restored?: SessionBlob;
}

export interface ApiCall {
    url: string;
    method: HttpMethod;
    headers: Record<string, string>;
}

const NOT_FOUND: ActionOutcome = { found: false, enabled: false, label: '', acted: false }

/** Scripted SessionDriver recording every call it receives */
export class FakeDriver implements SessionDriver<FakeSession> {
    readonly headless: boolean
    sessions: FakeSession[] = []
    openOptions: OpenOptions[] = []
    closed: number[] = []
    calls: string[] = []
    apiCalls: ApiCall[] = []
    diagnostics: Array<{ session: number, name: string }> = []
    private userCalls = 0
    private authChecks = 0
    private textReads = 0

    constructor(private readonly script: FakeScript = {}) {
        this.headless = script.headless ?? true
    }

    private fails(point: FailurePoint): boolean {
        return this.script.failOn?.includes(point) ?? false
    }

    private newSession(site: SiteDescriptor): FakeSession {
        const session: FakeSession = { id: this.sessions.length + 1, site, url: 'about:blank', authenticated: false }
        this.sessions.push(session)
        return session
    }

    async open(site: SiteDescriptor, options: OpenOptions): Promise<FakeSession> {
        this.calls.push('open')
        this.openOptions.push(options)
        if (this.fails('open')) throw new Error('launch failed')
        return this.newSession(site)
    }

    async navigate(session: FakeSession, url: string): Promise<void> {
        this.calls.push(`navigate ${url}`)
        if (this.fails('navigate')) throw new Error('net::ERR_CONNECTION_RESET')
        session.url = url
    }

    async currentUrl(session: FakeSession): Promise<string> {
        return session.url
    }

    async fill(_session: FakeSession, selectors: readonly string[]): Promise<boolean> {
        this.calls.push(`fill ${selectors[0] ?? ''}`)
        return this.script.fillAccepts ?? true
    }

    async findAndAct(session: FakeSession, selectors: readonly string[], action: ElementAction): Promise<ActionOutcome> {
        this.calls.push(`${action} ${selectors[0] ?? ''}`)
        const succeeds = this.script.loginSucceeds ?? true

        if (selectors === SELECTORS.checkinButton) return this.script.checkinButton ?? NOT_FOUND
        if (selectors === SELECTORS.loginButton) {
            if (succeeds) {
                session.authenticated = true
                if (!this.script.confirmAfterPolls) session.url = siteUrl(session.site, session.site.consolePath)
            }
            return { found: true, enabled: true, label: '登录', acted: true }
        }
        // OAuth provider button
        if (succeeds) session.authenticated = true
        return { found: true, enabled: true, label: session.site.oauthButtonLabel, acted: true }
    }

    async press(_session: FakeSession, key: string): Promise<void> {
        this.calls.push(`press ${key}`)
    }

    async pageText(): Promise<string> {
        this.textReads++
        if (this.textReads <= (this.script.navigatingReads ?? 0)) {
            throw new Error('Unable to retrieve content because the page is navigating')
        }
        return this.script.pageText ?? ''
    }

    async evaluateAuthenticated(session: FakeSession): Promise<boolean> {
        this.authChecks++
        return session.authenticated && this.authChecks > (this.script.confirmAfterPolls ?? 0)
    }

    async callApiInPage(session: FakeSession, url: string, method: HttpMethod, _body?: unknown, headers: Record<string, string> = {}): Promise<unknown> {
        this.apiCalls.push({ url, method, headers })
        const { site } = session

        if (url === siteUrl(site, site.userApiPath)) {
            this.userCalls++
            if (this.fails('user:1') && this.userCalls === 1) throw new Error('user read failed')
            if (this.fails('user:2') && this.userCalls === 2) throw new Error('user read failed')
            const payloads = this.script.userInfo ?? []
            return payloads[Math.min(this.userCalls, payloads.length) - 1] ?? { success: false, message: 'no user' }
        }
        if (url === siteUrl(site, site.tokensApiPath)) {
            if (this.fails('tokens')) throw new Error('token read failed')
            return this.script.tokens ?? { success: true, data: [] }
        }
        if (url === siteUrl(site, site.checkinApiPath)) {
            if (this.fails('checkin')) throw new Error('socket hang up')
            return this.script.checkinResponse ?? { success: true, message: '签到成功' }
        }
        throw new Error(`unexpected API call ${method} ${url}`)
    }

    async saveSessionState(): Promise<SessionBlob> {
        if (this.fails('save')) throw new Error('disk full')
        return { cookies: [{ name: 'session', value: 'abc' }] }
    }

    async restoreSessionState(session: FakeSession, blob: SessionBlob): Promise<FakeSession> {
        this.calls.push('restore')
        const target = this.script.restoreOpensNew ? this.newSession(session.site) : session
        target.restored = blob
        if (this.script.savedSessionValid) target.authenticated = true
        return target
    }

    async captureDiagnostics(session: FakeSession, name: string): Promise<void> {
        if (this.fails('diagnostics')) throw new Error('screenshot failed')
        if (this.closed.includes(session.id)) throw new Error(`session ${session.id} is closed`)
        this.diagnostics.push({ session: session.id, name })
    }

    async close(session: FakeSession): Promise<void> {
        this.closed.push(session.id)
        if (this.fails('close')) throw new Error('already closed')
    }
}

export function makeResult(overrides: Partial<AccountResult> & Pick<AccountResult, 'username'>): AccountResult {
    const baseUrl = overrides.baseUrl ?? 'https://anyrouter.top'
    return {
        accountKey: `${baseUrl}::${overrides.username}`,
        label: `${overrides.username} @ ${baseUrl}`,
        site: 'anyrouter.top',
        baseUrl,
        authMode: 'local',
        success: true,
        quotaRemaining: 0,
        quotaDelta: 0,
        tokens: [],
        state: 'Done',
        checkin: 'checked-in',
        message: '',
        attempt: 1,
        durationMs: 1500,
        finishedAt: '2026-01-15T12:00:00.000Z',
        ...overrides
    }
}
