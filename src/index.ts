#!/usr/bin/env node
import type { BrowserOptions } from './browser/Browser'
import { PlaywrightDriver } from './browser/BrowserDriver'
import { HttpDriver } from './browser/HttpDriver'

import { BatchOrchestrator } from './functions/Batch'
import { CheckinWorkflow } from './functions/Checkin'
import type { AccountRunner } from './functions/Checkin'

import type { Account } from './interface/Account'
import type { Config, DriverKind } from './interface/Config'
import type { AccountResult } from './interface/Result'
import { formatLabel } from './util/AccountKey'
import { ConclusionReporter } from './util/ConclusionWebhook'
import { errorMessage } from './util/Errors'
import { FileSessionStore, filterAccounts, loadConfig, resolveConfigPath } from './util/Load'
import { createLogger, flushLiveLogs } from './util/Logger'
import type { Logger } from './util/Logger'
import { FileReporter, ReportDispatcher, summarize } from './util/Report'
import { resolveSite, siteUrl } from './util/Site'
import Util from './util/Utils'

export interface CliOptions {
    headful: boolean;
    driver?: DriverKind;
    dryRun: boolean;
}

export function parseCliFlags(argv: readonly string[]): CliOptions {
    const options: CliOptions = {
        headful: argv.includes('--headful'),
        dryRun: argv.includes('--dry-run')
    }
    const idx = argv.indexOf('--driver')
    const driver = idx >= 0 ? argv[idx + 1] : undefined
    if (driver === 'http' || driver === 'browser') options.driver = driver
    return options
}

export class CheckinRunner {
    public log: Logger
    public utils = new Util()
    private runId: string = Math.random().toString(36).slice(2)
    private accounts: Account[] = []

    constructor(public config: Config, cli: CliOptions) {
        if (cli.headful) this.config.settings.headless = false
        if (cli.driver) this.config.settings.driver = cli.driver
        if (cli.dryRun) this.config.settings.dryRun = true

        this.log = createLogger({ logging: config.settings.logging, webhook: config.settings.webhook })
    }

    initialize() {
        const { valid, skipped } = filterAccounts(this.config.accounts, this.config.settings)
        for (const username of skipped) {
            this.log('main', 'CONFIG', `Skipping disabled or placeholder account: ${username}`, 'warn')
        }
        this.accounts = valid
        this.log('main', 'CONFIG', `Loaded ${valid.length} account(s), skipped ${skipped.length}`)
    }

    private createWorkflow(): AccountRunner {
        const { settings } = this.config
        const deps = { log: this.log, utils: this.utils, sessionStore: new FileSessionStore() }
        const timeoutMs = this.utils.stringToMs(settings.globalTimeout)

        if (settings.driver === 'http') {
            return new CheckinWorkflow({ ...deps, driver: new HttpDriver(this.log, timeoutMs) })
        }
        const browserOptions: BrowserOptions = { headless: settings.headless, timeoutMs }
        if (settings.diagnostics.enabled) browserOptions.diagnosticsDir = settings.diagnostics.dir
        return new CheckinWorkflow({
            ...deps,
            driver: new PlaywrightDriver(browserOptions, this.log, this.utils)
        })
    }

    private printSites() {
        for (const account of this.accounts) {
            const site = resolveSite(this.config.settings, account)
            this.log('main', 'DRY-RUN', [
                formatLabel(site, account.username.trim()),
                `auth=${site.authMode}`,
                `login=${siteUrl(site, site.loginPath)}`,
                `checkin=${siteUrl(site, site.checkinApiPath)}`,
                `session=${site.savedSessionPath ?? 'none'}`
            ].join(' | '))
        }
    }

    async run(): Promise<AccountResult[]> {
        const { settings } = this.config
        this.log('main', 'MAIN', `Check-in run ${this.runId} started (driver=${settings.driver}, headless=${settings.headless})`)

        if (this.accounts.length === 0) {
            this.log('main', 'MAIN', 'No valid accounts to process', 'warn')
            return []
        }
        if (settings.dryRun) {
            this.printSites()
            return []
        }

        const orchestrator = new BatchOrchestrator(this.createWorkflow(), this.log, this.utils)
        const results = await orchestrator.runWithRetries(this.accounts, settings, settings.maxRetries, settings.retryDelayHours)

        const summary = summarize(results, this.runId)
        this.log('main', 'MAIN', `Finished: ${summary.succeeded}/${summary.total} succeeded, quota +${summary.quotaGained}`, summary.failed > 0 ? 'warn' : 'log')
        if (summary.failedLabels.length > 0) {
            this.log('main', 'MAIN', `Failed: ${summary.failedLabels.join(', ')}`, 'warn')
        }

        const reporter = new ReportDispatcher([
            new FileReporter(settings.report, this.log, this.utils),
            new ConclusionReporter(settings, this.log)
        ], this.log)
        await reporter.report(results, summary)

        return results
    }
}

async function main() {
    const cli = parseCliFlags(process.argv.slice(2))
    const config = loadConfig(resolveConfigPath())
    const runner = new CheckinRunner(config, cli)

    const gracefulExit = (code: number) => {
        void flushLiveLogs().finally(() => process.exit(code))
    }

    // the retry backoff can last hours; signals still end the process
    process.on('SIGTERM', () => gracefulExit(143))
    process.on('SIGINT', () => gracefulExit(130))
    process.on('unhandledRejection', (reason) => {
        runner.log('main', 'FATAL', 'UnhandledRejection: ' + errorMessage(reason), 'error')
        gracefulExit(1)
    })

    runner.initialize()
    const results = await runner.run()
    await flushLiveLogs()

    process.exitCode = results.some(r => !r.success) ? 1 : 0
}

if (require.main === module) {
    main().catch(error => {
        console.error(`[MAIN-ERROR] ${errorMessage(error)}`)
        process.exit(1)
    })
}
