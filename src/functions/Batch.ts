import type { Account } from '../interface/Account'
import type { ConfigSettings } from '../interface/Config'
import type { AccountResult } from '../interface/Result'
import { buildKey } from '../util/AccountKey'
import type { Logger } from '../util/Logger'
import { resolveSite } from '../util/Site'
import Util from '../util/Utils'
import { failureResult } from './Checkin'
import type { AccountRunner, WorkflowSettings } from './Checkin'

export type BatchSettings = WorkflowSettings & Pick<ConfigSettings, 'minDelay' | 'maxDelay'>

const HOUR_MS = 3600000

export class BatchOrchestrator {
    /** Attempts per account key within the current run */
    private attempts = new Map<string, number>()

    constructor(
        private readonly runner: AccountRunner,
        private readonly log: Logger,
        private readonly utils: Util = new Util()
    ) { }

    private keyOf(account: Account, settings: BatchSettings): string {
        return buildKey(resolveSite(settings, account), account.username)
    }

    /**
     * One pass over the accounts, strictly one at a time, with a random pause of
     * minDelay..maxDelay seconds between accounts.
     */
    async runRound(accounts: Account[], settings: BatchSettings): Promise<AccountResult[]> {
        const results: AccountResult[] = []

        for (let i = 0; i < accounts.length; i++) {
            const account = accounts[i]
            if (!account) continue

            const key = this.keyOf(account, settings)
            const attempt = (this.attempts.get(key) ?? 0) + 1
            this.attempts.set(key, attempt)

            this.log('main', 'ROUND', `Account ${i + 1}/${accounts.length}: ${account.username.trim()}`)
            const startedAt = this.utils.now()
            try {
                results.push(await this.runner.run(account, settings, attempt))
            } catch (error) {
                // runners report failures as results; this only catches a broken runner
                results.push(failureResult(resolveSite(settings, account), account, error, attempt, this.utils.now() - startedAt))
            }

            if (i < accounts.length - 1) {
                const delayMs = this.utils.randomNumber(settings.minDelay * 1000, settings.maxDelay * 1000)
                this.log('main', 'ROUND', `Waiting ${Math.round(delayMs / 1000)}s before the next account`)
                await this.utils.wait(delayMs)
            }
        }

        return results
    }

    /**
     * Round 0 over every account, then up to maxRetries rounds over the accounts whose latest
     * result failed, waiting retryDelayHours before each. One result per account key, in the
     * order the keys were first attempted; the latest attempt wins.
     */
    async runWithRetries(accounts: Account[], settings: BatchSettings, maxRetries: number, retryDelayHours: number): Promise<AccountResult[]> {
        this.attempts.clear()
        const merged = new Map<string, AccountResult>()
        let pending = accounts

        for (let round = 0; ; round++) {
            if (round > 0) {
                this.log('main', 'RETRY', `Retry round ${round}/${maxRetries} for ${pending.length} account(s)`)
            }

            for (const result of await this.runRound(pending, settings)) {
                merged.set(result.accountKey, result)
            }

            pending = this.failedAccounts(accounts, settings, merged)
            if (pending.length === 0) {
                this.log('main', 'RETRY', 'All accounts succeeded', 'log', 'green')
                break
            }
            if (round >= maxRetries) {
                this.log('main', 'RETRY', `${pending.length} account(s) still failing after ${round + 1} round(s)`, 'warn')
                break
            }

            this.log('main', 'RETRY', `${pending.length} account(s) failed, retrying in ${retryDelayHours}h`, 'warn')
            await this.utils.wait(retryDelayHours * HOUR_MS)
        }

        return [...merged.values()]
    }

    /** Originally attempted accounts whose merged result is a failure, one per key */
    private failedAccounts(accounts: Account[], settings: BatchSettings, merged: Map<string, AccountResult>): Account[] {
        const seen = new Set<string>()
        const failed: Account[] = []
        for (const account of accounts) {
            const key = this.keyOf(account, settings)
            if (seen.has(key)) continue
            seen.add(key)
            if (merged.get(key)?.success === false) failed.push(account)
        }
        return failed
    }
}
