import { LOGIN_REJECTED, SELECTORS, TIMEOUTS, oauthButtonSelectors } from '../constants'
import type { Account } from '../interface/Account'
import type { SessionDriver, SessionStore } from '../interface/SessionDriver'
import type { SiteDescriptor } from '../interface/Site'
import { AuthenticationError, errorMessage } from '../util/Errors'
import type { Logger } from '../util/Logger'
import { siteUrl } from '../util/Site'
import Util from '../util/Utils'

/** Collaborators shared by the login and check-in steps of one workflow */
export interface WorkflowDeps<S> {
    driver: SessionDriver<S>;
    log: Logger;
    utils: Util;
    sessionStore: SessionStore;
}

/** The session a workflow holds; login swaps it in place when a driver hands back a new one */
export interface SessionHandle<S> {
    session: S;
}

interface PollOptions {
    timeoutMs: number;
    /** Fail early with bad-credentials when the page shows a login error */
    watchRejection: boolean;
}

export class Login<S> {
    constructor(private readonly deps: WorkflowDeps<S>) { }

    /** Authenticate the handle's session with the site's auth mode */
    async authenticate(handle: SessionHandle<S>, site: SiteDescriptor, account: Account, label: string): Promise<void> {
        if (site.authMode === 'oauthDelegate') {
            await this.delegateLogin(handle, site, label)
        } else {
            await this.localLogin(handle.session, site, account, label)
        }

        await this.persistSession(handle.session, site, label)
    }

    private async localLogin(session: S, site: SiteDescriptor, account: Account, label: string): Promise<void> {
        const { driver, log } = this.deps

        log(label, 'LOGIN', `Signing in at ${siteUrl(site, site.loginPath)}`)
        await driver.navigate(session, siteUrl(site, site.loginPath), 'networkidle')
        await this.settle()

        const filledUser = await driver.fill(session, SELECTORS.usernameInput, account.username.trim())
        const filledPassword = filledUser && await driver.fill(session, SELECTORS.passwordInput, account.password ?? '')
        if (!filledUser || !filledPassword) {
            throw new AuthenticationError('bad-credentials', 'Login form did not accept the credentials')
        }

        await this.settle()
        const submit = await driver.findAndAct(session, SELECTORS.loginButton, 'click')
        if (!submit.acted) {
            log(label, 'LOGIN', 'No login button could be clicked, submitting with Enter', 'warn')
            await driver.press(session, 'Enter')
        }

        const confirmed = await this.waitForAuthentication(session, site, {
            timeoutMs: TIMEOUTS.LOGIN_CONFIRM,
            watchRejection: true
        })
        if (!confirmed) {
            throw new AuthenticationError('timeout', `Login was not confirmed within ${TIMEOUTS.LOGIN_CONFIRM / 1000}s`)
        }

        log(label, 'LOGIN', 'Login successful', 'log', 'green')
    }

    private async delegateLogin(handle: SessionHandle<S>, site: SiteDescriptor, label: string): Promise<void> {
        const { driver, log } = this.deps
        const probeUrl = siteUrl(site, site.userApiPath)

        const blob = await this.loadSavedSession(site, label)
        if (blob) {
            handle.session = await driver.restoreSessionState(handle.session, blob)
            await driver.navigate(handle.session, siteUrl(site, site.consolePath), 'domcontentloaded')
            if (await this.probe(handle.session, probeUrl)) {
                log(label, 'LOGIN', 'Resumed saved session', 'log', 'green')
                return
            }
            log(label, 'LOGIN', 'Saved session is no longer valid', 'warn')
        }

        if (driver.headless) {
            throw new AuthenticationError(
                'human-intervention-required',
                `${site.oauthButtonLabel} authorization needs a visible browser and a person to complete it`
            )
        }

        log(label, 'LOGIN', `Waiting up to ${site.manualAuthTimeoutSeconds}s for ${site.oauthButtonLabel} authorization in the browser window`, 'warn', 'yellow')
        await driver.navigate(handle.session, siteUrl(site, site.oauthEntryPath), 'domcontentloaded')
        await this.settle()

        const button = await driver.findAndAct(handle.session, oauthButtonSelectors(site.oauthButtonLabel), 'click')
        if (!button.acted) {
            log(label, 'LOGIN', `No "${site.oauthButtonLabel}" button found, complete the authorization manually`, 'warn')
        }

        const confirmed = await this.waitForAuthentication(handle.session, site, {
            timeoutMs: site.manualAuthTimeoutSeconds * 1000,
            watchRejection: false
        })
        if (!confirmed) {
            throw new AuthenticationError('timeout', `Authorization was not completed within ${site.manualAuthTimeoutSeconds}s`)
        }

        log(label, 'LOGIN', 'Delegate authorization completed', 'log', 'green')
    }

    /** Poll until the console URL is reached or the user probe succeeds */
    private async waitForAuthentication(session: S, site: SiteDescriptor, options: PollOptions): Promise<boolean> {
        const { driver, utils } = this.deps
        const deadline = utils.now() + options.timeoutMs
        const consoleUrl = siteUrl(site, site.consolePath)
        const probeUrl = siteUrl(site, site.userApiPath)

        for (;;) {
            const url = await driver.currentUrl(session)
            if (url.startsWith(consoleUrl)) return true
            if (await this.probe(session, probeUrl)) return true

            if (options.watchRejection) {
                // content is unreadable while the page navigates after the submit
                const text = await driver.pageText(session).catch(() => '')
                const rejection = LOGIN_REJECTED.exec(text)
                if (rejection) {
                    throw new AuthenticationError('bad-credentials', `Site rejected the login: ${rejection[0]}`)
                }
            }

            if (utils.now() >= deadline) return false
            await utils.wait(TIMEOUTS.AUTH_POLL_INTERVAL)
        }
    }

    private async probe(session: S, probeUrl: string): Promise<boolean> {
        return this.deps.driver.evaluateAuthenticated(session, probeUrl).catch(() => false)
    }

    private async loadSavedSession(site: SiteDescriptor, label: string) {
        if (!site.savedSessionPath) return null
        try {
            return await this.deps.sessionStore.load(site.savedSessionPath)
        } catch (error) {
            this.deps.log(label, 'LOGIN', `Could not read saved session ${site.savedSessionPath}: ${errorMessage(error)}`, 'warn')
            return null
        }
    }

    private async persistSession(session: S, site: SiteDescriptor, label: string): Promise<void> {
        const { driver, log, sessionStore } = this.deps
        if (!site.savedSessionPath || !driver.saveSessionState) return

        try {
            const blob = await driver.saveSessionState(session)
            await sessionStore.save(site.savedSessionPath, blob)
            log(label, 'LOGIN', `Saved session to ${site.savedSessionPath}`)
        } catch (error) {
            log(label, 'LOGIN', `Could not save session: ${errorMessage(error)}`, 'warn')
        }
    }

    private async settle(): Promise<void> {
        const { utils } = this.deps
        await utils.wait(utils.randomNumber(TIMEOUTS.SETTLE_MIN, TIMEOUTS.SETTLE_MAX))
    }
}
