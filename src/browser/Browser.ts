import playwright from 'rebrowser-playwright'
import type { Browser as PlaywrightBrowser, BrowserContext, LaunchOptions, Page } from 'rebrowser-playwright'

import type { OpenOptions } from '../interface/SessionDriver'
import type { SiteDescriptor } from '../interface/Site'
import { parseProxy } from '../util/Axios'
import { errorMessage } from '../util/Errors'
import type { Logger } from '../util/Logger'
import Util from '../util/Utils'

export interface BrowserSession {
    browser: PlaywrightBrowser;
    context: BrowserContext;
    page: Page;
    /** Attached over CDP to a browser this process does not own */
    attached: boolean;
    /** Log scope, the site name */
    scope: string;
}

export interface BrowserOptions {
    headless: boolean;
    /** Default timeout for page actions, ms */
    timeoutMs: number;
    /** Where failure screenshots go; unset turns them off */
    diagnosticsDir?: string;
}

class Browser {
    constructor(
        private readonly options: BrowserOptions,
        private readonly log: Logger,
        private readonly utils: Util = new Util()
    ) { }

    async createSession(site: SiteDescriptor, open: OpenOptions): Promise<BrowserSession> {
        if (open.remoteDebugEndpoint) {
            return this.attach(site, open.remoteDebugEndpoint)
        }

        const browser = await this.launch(site, open)
        try {
            const context = await browser.newContext({ ignoreHTTPSErrors: true })
            context.setDefaultTimeout(this.options.timeoutMs)
            const page = await context.newPage()
            return { browser, context, page, attached: false, scope: site.name }
        } catch (error) {
            await browser.close().catch((e: unknown) => this.log(site.name, 'BROWSER', `Failed to close browser: ${errorMessage(e)}`, 'warn'))
            throw error
        }
    }

    private async attach(site: SiteDescriptor, endpoint: string): Promise<BrowserSession> {
        this.log(site.name, 'BROWSER', `Attaching to remote browser at ${endpoint}`)
        const browser = await playwright.chromium.connectOverCDP(endpoint, { timeout: this.options.timeoutMs })
        // the remote browser's default context carries its cookies
        const context = browser.contexts()[0] ?? await browser.newContext()
        context.setDefaultTimeout(this.options.timeoutMs)
        const page = await context.newPage()
        return { browser, context, page, attached: true, scope: site.name }
    }

    private async launch(site: SiteDescriptor, open: OpenOptions): Promise<PlaywrightBrowser> {
        const launchOpts: LaunchOptions = {
            headless: this.options.headless,
            timeout: this.options.timeoutMs,
            args: [
                '--no-sandbox',
                '--mute-audio',
                '--disable-setuid-sandbox',
                '--ignore-certificate-errors'
            ]
        }

        if (open.proxy) {
            const proxy = parseProxy(open.proxy)
            launchOpts.proxy = { server: proxy.server }
            if (proxy.username) {
                launchOpts.proxy.username = proxy.username
                launchOpts.proxy.password = proxy.password ?? ''
            }
            this.log(site.name, 'BROWSER', `Using proxy for launch. Server=${proxy.server}`)
        }

        // Launch with retries
        const maxLaunchAttempts = 3
        let launchErr: unknown

        for (let attempt = 1; attempt <= maxLaunchAttempts; attempt++) {
            try {
                return await playwright.chromium.launch(launchOpts)
            } catch (e: unknown) {
                launchErr = e
                if (attempt === maxLaunchAttempts) break
                const waitMs = Math.min(15000, Math.pow(2, attempt) * 500 + this.utils.randomNumber(0, 500))
                this.log(site.name, 'BROWSER', `Launch attempt ${attempt} failed: ${errorMessage(e)}. Retrying after ${waitMs}ms`, 'warn')
                await this.utils.wait(waitMs)
            }
        }

        this.log(site.name, 'BROWSER', `Failed to launch browser after ${maxLaunchAttempts} attempts: ${errorMessage(launchErr)}`, 'error')
        throw launchErr
    }

    async closeSession(session: BrowserSession): Promise<void> {
        const warn = (e: unknown) => this.log(session.scope, 'BROWSER', `Failed to close page: ${errorMessage(e)}`, 'warn')
        if (session.attached) {
            // leave the remote browser running, only drop our tab and the connection
            await session.page.close().catch(warn)
        } else {
            await session.context.close().catch(warn)
        }
        await session.browser.close()
    }
}

export default Browser
