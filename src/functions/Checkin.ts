import { ALREADY_CHECKED_IN, CHECKIN_SUCCESS_INDICATORS, SELECTORS, TIMEOUTS } from '../constants'
import type { Account } from '../interface/Account'
import type { ConfigSettings } from '../interface/Config'
import type { OpenOptions } from '../interface/SessionDriver'
import type { SiteDescriptor } from '../interface/Site'
import type { AccountResult, CheckinStatus, WorkflowState } from '../interface/Result'
import type { TokenRecord } from '../interface/Token'
import { buildKey, formatLabel } from '../util/AccountKey'
import {
    CheckinAmbiguousError,
    CheckinError,
    ConfigurationError,
    TransientIOError,
    errorMessage,
    toCheckinError
} from '../util/Errors'
import { resolveSite, siteUrl } from '../util/Site'
import { normalizeTokens, normalizeUserInfo, readApiOutcome } from '../util/Tokens'
import { Login } from './Login'
import type { SessionHandle, WorkflowDeps } from './Login'

export type { WorkflowDeps } from './Login'

export type WorkflowSettings = Pick<ConfigSettings, 'site' | 'baseUrl' | 'proxy' | 'remoteDebugEndpoint'>

/** Anything that can process one account into a result */
export interface AccountRunner {
    run(account: Account, settings: WorkflowSettings, attempt?: number): Promise<AccountResult>;
}

interface CheckinOutcome {
    success: boolean;
    status: CheckinStatus;
    message: string;
}

/** Data captured so far, kept for the failure result */
interface Progress {
    state: WorkflowState;
    userId?: number;
    quotaBefore?: number;
    quotaAfter?: number;
    tokens: TokenRecord[];
    checkin: CheckinStatus;
    message: string;
}

/** Failed result for an account that never reached the workflow (or crashed outside of it) */
export function failureResult(site: SiteDescriptor, account: Account, error: unknown, attempt: number, durationMs = 0): AccountResult {
    const err = toCheckinError(error)
    const username = account.username.trim()
    return {
        accountKey: buildKey(site, username),
        label: formatLabel(site, username),
        username,
        site: site.name,
        baseUrl: site.baseUrl,
        authMode: site.authMode,
        success: false,
        quotaRemaining: 0,
        quotaDelta: 0,
        tokens: [],
        state: 'Aborted',
        checkin: 'skipped',
        message: err.message,
        errorKind: err.kind,
        attempt,
        durationMs,
        finishedAt: new Date().toISOString()
    }
}

/**
 * Idle -> Authenticating -> Authenticated -> CheckingIn -> Done, or Aborted from any of them.
 * Never throws: every failure becomes a failed AccountResult.
 */
export class CheckinWorkflow<S> implements AccountRunner {
    private login: Login<S>

    constructor(private readonly deps: WorkflowDeps<S>) {
        this.login = new Login(deps)
    }

    async run(account: Account, settings: WorkflowSettings, attempt = 1): Promise<AccountResult> {
        const { driver, log, utils } = this.deps
        const startedAt = utils.now()
        const site = resolveSite(settings, account)
        const username = account.username.trim()
        const label = formatLabel(site, username)
        const progress: Progress = { state: 'Idle', tokens: [], checkin: 'skipped', message: '' }

        let handle: SessionHandle<S> | null = null

        try {
            if (!username) throw new ConfigurationError('Account has no username')
            if (site.authMode === 'local' && !(account.password ?? '').trim()) {
                throw new ConfigurationError('Local login needs a password')
            }

            progress.state = 'Authenticating'
            log(label, 'CHECKIN', `Starting attempt ${attempt} on ${site.name}`)
            handle = { session: await driver.open(site, this.openOptions(account, settings)) }
            await this.login.authenticate(handle, site, account, label)

            progress.state = 'Authenticated'
            await this.readBalances(handle.session, site, progress, 'before', label)

            progress.state = 'CheckingIn'
            const outcome = await this.performCheckin(handle.session, site, progress, label)
            progress.checkin = outcome.status
            progress.message = outcome.message
            if (!outcome.success) {
                throw new TransientIOError(`Check-in rejected: ${outcome.message || 'no message'}`)
            }

            progress.state = 'Done'
            await this.readBalances(handle.session, site, progress, 'after', label)

            const result = this.buildResult(site, username, progress, true, attempt, startedAt)
            const delta = result.quotaDelta > 0 ? ` (+${result.quotaDelta})` : ''
            log(label, 'CHECKIN', `Completed: ${outcome.status}, quota ${result.quotaRemaining}${delta}`, 'log', 'green')
            return result
        } catch (error) {
            const err = toCheckinError(error)
            const failedIn = progress.state
            progress.state = 'Aborted'
            if (progress.checkin === 'skipped' && failedIn === 'CheckingIn') progress.checkin = 'failed'
            progress.message = err.message
            log(label, 'CHECKIN', `Aborted during ${failedIn}: ${err.message}`, 'error')
            if (handle) await this.captureDiagnostics(handle.session, `${username}-${failedIn.toLowerCase()}`, label)
            return this.buildResult(site, username, progress, false, attempt, startedAt, err)
        } finally {
            if (handle) await this.closeSession(handle.session, label)
        }
    }

    private openOptions(account: Account, settings: WorkflowSettings): OpenOptions {
        const options: OpenOptions = {}
        const proxy = account.proxy ?? settings.proxy
        if (proxy) options.proxy = proxy
        const remote = account.remoteDebugEndpoint ?? settings.remoteDebugEndpoint
        if (remote) options.remoteDebugEndpoint = remote
        return options
    }

    private apiHeaders(progress: Progress): Record<string, string> {
        return progress.userId !== undefined ? { 'New-Api-User': String(progress.userId) } : {}
    }

    /** Best-effort: a failed read leaves the previous values in place */
    private async readBalances(session: S, site: SiteDescriptor, progress: Progress, phase: 'before' | 'after', label: string): Promise<void> {
        const { driver, log } = this.deps

        try {
            const payload = await driver.callApiInPage(session, siteUrl(site, site.userApiPath), 'GET', undefined, this.apiHeaders(progress))
            const info = normalizeUserInfo(payload)
            if (info.userId !== undefined) progress.userId = info.userId
            if (info.quota !== undefined) {
                if (phase === 'before') progress.quotaBefore = info.quota
                else progress.quotaAfter = info.quota
            }
        } catch (error) {
            log(label, 'QUOTA', `Could not read user info: ${errorMessage(error)}`, 'warn')
        }

        try {
            const payload = await driver.callApiInPage(session, siteUrl(site, site.tokensApiPath), 'GET', undefined, this.apiHeaders(progress))
            const tokens = normalizeTokens(payload)
            if (tokens.length > 0) progress.tokens = tokens
        } catch (error) {
            log(label, 'QUOTA', `Could not read tokens: ${errorMessage(error)}`, 'warn')
        }
    }

    private async performCheckin(session: S, site: SiteDescriptor, progress: Progress, label: string): Promise<CheckinOutcome> {
        const { driver, log, utils } = this.deps

        const consoleUrl = siteUrl(site, site.consolePath)
        if (!(await driver.currentUrl(session)).startsWith(consoleUrl)) {
            await driver.navigate(session, consoleUrl, 'networkidle')
            await utils.wait(utils.randomNumber(TIMEOUTS.SETTLE_MIN, TIMEOUTS.SETTLE_MAX))
        }

        const button = await driver.findAndAct(session, SELECTORS.checkinButton, 'click')

        if (button.found && !button.enabled && ALREADY_CHECKED_IN.test(button.label)) {
            // Trusts the button label without asking the API
            log(label, 'CHECKIN', `Check-in button says "${button.label}", already checked in today`)
            return { success: true, status: 'already-checked-in', message: button.label }
        }

        if (button.acted) {
            await utils.wait(utils.randomNumber(TIMEOUTS.SETTLE_MIN, TIMEOUTS.SETTLE_MAX))
            const text = (await driver.pageText(session)).toLowerCase()
            const indicator = CHECKIN_SUCCESS_INDICATORS.find(i => text.includes(i.toLowerCase()))
            if (indicator) {
                log(label, 'CHECKIN', `Checked in from the console (${indicator})`)
                return { success: true, status: 'checked-in', message: indicator }
            }
            const ambiguous = new CheckinAmbiguousError('Check-in clicked but the page did not confirm it')
            log(label, 'CHECKIN', ambiguous.message, 'warn')
            return { success: true, status: 'unconfirmed', message: ambiguous.message }
        }

        log(label, 'CHECKIN', button.found ? 'Check-in button not usable, calling the API' : 'No check-in button, calling the API')
        const payload = await driver.callApiInPage(session, siteUrl(site, site.checkinApiPath), 'POST', undefined, this.apiHeaders(progress))
        const outcome = readApiOutcome(payload)

        if (outcome.success) {
            return { success: true, status: 'checked-in', message: outcome.message || 'Checked in' }
        }
        if (ALREADY_CHECKED_IN.test(outcome.message)) {
            log(label, 'CHECKIN', 'Already checked in today')
            return { success: true, status: 'already-checked-in', message: outcome.message }
        }
        return { success: false, status: 'failed', message: outcome.message }
    }

    private buildResult(
        site: SiteDescriptor,
        username: string,
        progress: Progress,
        success: boolean,
        attempt: number,
        startedAt: number,
        error?: CheckinError
    ): AccountResult {
        const { quotaBefore, quotaAfter } = progress
        const result: AccountResult = {
            accountKey: buildKey(site, username),
            label: formatLabel(site, username),
            username,
            site: site.name,
            baseUrl: site.baseUrl,
            authMode: site.authMode,
            success,
            quotaRemaining: quotaAfter ?? quotaBefore ?? 0,
            quotaDelta: quotaAfter !== undefined && quotaBefore !== undefined ? quotaAfter - quotaBefore : 0,
            tokens: progress.tokens,
            state: progress.state,
            checkin: progress.checkin,
            message: progress.message,
            attempt,
            durationMs: Math.max(0, this.deps.utils.now() - startedAt),
            finishedAt: new Date(this.deps.utils.now()).toISOString()
        }
        if (progress.userId !== undefined) result.userId = progress.userId
        if (quotaBefore !== undefined) result.quotaBefore = quotaBefore
        if (error) result.errorKind = error.kind
        return result
    }

    private async captureDiagnostics(session: S, name: string, label: string): Promise<void> {
        const { driver, log } = this.deps
        if (!driver.captureDiagnostics) return
        try {
            await driver.captureDiagnostics(session, name)
        } catch (error) {
            log(label, 'BROWSER', `Failed to capture diagnostics: ${errorMessage(error)}`, 'warn')
        }
    }

    private async closeSession(session: S, label: string): Promise<void> {
        try {
            await this.deps.driver.close(session)
        } catch (error) {
            this.deps.log(label, 'BROWSER', `Failed to close session: ${errorMessage(error)}`, 'warn')
        }
    }
}
