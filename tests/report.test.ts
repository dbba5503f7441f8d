import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import type { AccountResult, RunSummary } from '../src/interface/Result'
import { FileReporter, ReportDispatcher, maskKey, redactResults, summarize, toCsv, toText } from '../src/util/Report'
import type { Reporter } from '../src/util/Report'
import { FakeUtil, makeResult, recordingLogger } from './helpers'

const rejection = 'Site rejected the login: 密码错误, "again" (bad-credentials)'

const alice = makeResult({
    username: 'alice',
    userId: 42,
    quotaBefore: 1000,
    quotaRemaining: 1500,
    quotaDelta: 500,
    message: '签到成功',
    tokens: [{ name: 'main', key: 'abcdef123456', remainingQuota: 1500, usedQuota: 0, status: 1, expiredAt: -1, createdAt: 0 }]
})

const bob = makeResult({
    username: 'bob',
    success: false,
    state: 'Aborted',
    checkin: 'skipped',
    errorKind: 'AuthenticationError',
    message: rejection,
    attempt: 2
})

describe('summarize', () => {
    it('counts outcomes and sums the quota gained by successful accounts', () => {
        const failedWithDelta = makeResult({ username: 'carol', success: false, quotaDelta: 50, message: 'x' })

        expect(summarize([alice, bob, failedWithDelta], 'run1')).toEqual({
            runId: 'run1',
            total: 3,
            succeeded: 1,
            failed: 2,
            failedLabels: ['bob @ https://anyrouter.top', 'carol @ https://anyrouter.top'],
            quotaGained: 500
        })
    })
})

describe('toCsv', () => {
    it('writes a header and quotes fields holding commas or quotes', () => {
        const lines = toCsv([alice, bob]).split('\r\n')

        expect(lines).toHaveLength(4)
        expect(lines[0]).toBe('label,username,site,baseUrl,authMode,success,checkin,userId,quotaBefore,quotaRemaining,quotaDelta,tokenCount,state,errorKind,message,attempt,durationMs,finishedAt')
        expect(lines[1]).toBe('alice @ https://anyrouter.top,alice,anyrouter.top,https://anyrouter.top,local,true,checked-in,42,1000,1500,500,1,Done,,签到成功,1,1500,2026-01-15T12:00:00.000Z')
        expect(lines[2]).toBe('bob @ https://anyrouter.top,bob,anyrouter.top,https://anyrouter.top,local,false,skipped,,,0,0,0,Aborted,AuthenticationError,"Site rejected the login: 密码错误, ""again"" (bad-credentials)",2,1500,2026-01-15T12:00:00.000Z')
        expect(lines[3]).toBe('')
    })
})

describe('toText', () => {
    it('lists every account and the failed ones again at the end', () => {
        const summary = summarize([alice, bob], 'run1')

        expect(toText([alice, bob], summary)).toBe([
            'Check-in run run1',
            'Total: 2  Succeeded: 1  Failed: 1  Quota gained: 500',
            '',
            '[OK]   alice @ https://anyrouter.top - checked-in - quota 1500 (+500)',
            `[FAIL] bob @ https://anyrouter.top - AuthenticationError: ${rejection}`,
            '',
            'Failed accounts: bob @ https://anyrouter.top',
            ''
        ].join('\n'))
    })

    it('omits the failure section when everything succeeded', () => {
        const summary = summarize([alice], 'run2')
        expect(toText([alice], summary).endsWith('quota 1500 (+500)\n')).toBe(true)
    })
})

describe('FileReporter', () => {
    let dir: string
    const utils = new FakeUtil()

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkin-report-'))
    })

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true })
    })

    it('writes the enabled formats into a dated folder', async () => {
        const { log } = recordingLogger()
        const reporter = new FileReporter({ dir, json: true, csv: false, text: true }, log, utils)
        const summary = summarize([alice, bob], 'run1')

        await reporter.report([alice, bob], summary)

        const folder = path.join(dir, utils.getFormattedDate(utils.now()))
        expect(reporter.written).toEqual([path.join(folder, 'checkin_run1.json'), path.join(folder, 'checkin_run1.txt')])

        const json: unknown = JSON.parse(fs.readFileSync(path.join(folder, 'checkin_run1.json'), 'utf-8'))
        const maskedAlice = { ...alice, tokens: [{ ...alice.tokens[0], key: 'abcd****' }] }
        expect(json).toEqual({ summary, results: [maskedAlice, bob] })
        expect(fs.readFileSync(path.join(folder, 'checkin_run1.json'), 'utf-8')).not.toContain('abcdef123456')
        expect(fs.readFileSync(path.join(folder, 'checkin_run1.txt'), 'utf-8')).toBe(toText([alice, bob], summary))
    })

    it('writes nothing when every format is off', async () => {
        const { log } = recordingLogger()
        const reporter = new FileReporter({ dir, json: false, csv: false, text: false }, log, utils)

        await reporter.report([alice], summarize([alice], 'run3'))

        expect(reporter.written).toEqual([])
        expect(fs.readdirSync(dir)).toEqual([])
    })
})

describe('maskKey', () => {
    it('keeps four characters of long keys and hides short ones', () => {
        expect(maskKey('abcdef123456')).toBe('abcd****')
        expect(maskKey('abcd')).toBe('****')
    })

    it('leaves the results it was given untouched', () => {
        const [masked] = redactResults([alice])
        expect(masked?.tokens[0]?.key).toBe('abcd****')
        expect(alice.tokens[0]?.key).toBe('abcdef123456')
    })
})

describe('ReportDispatcher', () => {
    class BrokenReporter implements Reporter {
        async report(): Promise<void> {
            throw new Error('disk full')
        }
    }

    class CollectingReporter implements Reporter {
        received: Array<[AccountResult[], RunSummary]> = []

        async report(results: AccountResult[], summary: RunSummary): Promise<void> {
            this.received.push([results, summary])
        }
    }

    it('keeps going after a sink fails', async () => {
        const { log, entries } = recordingLogger()
        const collecting = new CollectingReporter()
        const summary = summarize([alice], 'run4')

        await new ReportDispatcher([new BrokenReporter(), collecting], log).report([alice], summary)

        expect(collecting.received).toEqual([[[alice], summary]])
        expect(entries).toContainEqual({ scope: 'main', title: 'REPORT', message: 'Report sink BrokenReporter failed: disk full', type: 'warn' })
    })
})
