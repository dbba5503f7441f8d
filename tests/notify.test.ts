import axios from 'axios'
import { describe, expect, it, vi } from 'vitest'

import { DISCORD } from '../src/constants'
import type { ConfigNtfy, ConfigSettings } from '../src/interface/Config'
import { ConclusionReporter, buildConclusion } from '../src/util/ConclusionWebhook'
import { Ntfy } from '../src/util/Ntfy'
import { summarize } from '../src/util/Report'
import { makeResult, recordingLogger } from './helpers'

type NotificationSettings = Pick<ConfigSettings, 'webhook' | 'conclusionWebhook' | 'ntfy'>

const alice = makeResult({ username: 'alice', quotaRemaining: 1500, quotaDelta: 500 })
const bob = makeResult({ username: 'bob', success: false, state: 'Aborted', message: 'Login was not confirmed within 30s (timeout)' })

const ntfyOff: ConfigNtfy = { enabled: false, url: '', topic: '' }

describe('buildConclusion', () => {
    it('describes the run and lists each account', () => {
        const conclusion = buildConclusion([alice, bob], summarize([alice, bob], 'run1'))

        expect(conclusion.color).toBe(DISCORD.COLOR_ORANGE)
        expect(conclusion.description).toBe('**Run:** run1\n**Accounts:** 2\n**Succeeded:** 1\n**Failed:** 1\n**Quota gained:** 500')
        expect(conclusion.fields).toEqual([{
            name: 'Accounts',
            value: '✓ alice @ https://anyrouter.top: checked-in, quota 1500 (+500)\n✗ bob @ https://anyrouter.top: Login was not confirmed within 30s (timeout)'
        }])
    })

    it('colors by outcome', () => {
        expect(buildConclusion([alice], summarize([alice], 'r')).color).toBe(DISCORD.COLOR_GREEN)
        expect(buildConclusion([bob], summarize([bob], 'r')).color).toBe(DISCORD.COLOR_CRIMSON)
    })
})

describe('Ntfy', () => {
    it('posts to the topic with priority and auth headers', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: 'ok' })

        await Ntfy({ enabled: true, url: 'https://ntfy.example.org/', topic: 'daily checkins', authToken: 'test-secret' }, 'hello', 'warn', 'Summary')

        expect(post).toHaveBeenCalledWith('https://ntfy.example.org/daily%20checkins', 'hello', {
            headers: {
                Title: 'Summary',
                Priority: '4',
                Tags: 'warning',
                'Content-Type': 'text/plain; charset=utf-8',
                Authorization: 'Bearer test-secret'
            },
            timeout: 10000
        })
    })

    it('does nothing when disabled or without a topic', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: 'ok' })

        await Ntfy(ntfyOff, 'hello')
        await Ntfy({ enabled: true, url: 'https://ntfy.example.org', topic: '' }, 'hello')

        expect(post).not.toHaveBeenCalled()
    })
})

describe('ConclusionReporter', () => {
    const settings: NotificationSettings = {
        conclusionWebhook: { enabled: true, url: 'https://hooks.example.org/summary' },
        webhook: { enabled: true, url: 'https://hooks.example.org/summary' },
        ntfy: ntfyOff
    }

    it('posts one embed per distinct webhook url', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: '' })
        const { log } = recordingLogger()

        await new ConclusionReporter(settings, log).report([alice, bob], summarize([alice, bob], 'run1'))

        expect(post).toHaveBeenCalledTimes(1)
        expect(post).toHaveBeenCalledWith(
            'https://hooks.example.org/summary',
            expect.objectContaining({
                username: 'Check-in Summary',
                embeds: [expect.objectContaining({ title: 'Check-in Summary', color: DISCORD.COLOR_ORANGE })]
            }),
            expect.objectContaining({ timeout: DISCORD.WEBHOOK_TIMEOUT })
        )
    })

    it('logs a failed webhook and still sends ntfy', async () => {
        const post = vi.spyOn(axios, 'post')
            .mockRejectedValueOnce(new Error('HTTP 500'))
            .mockResolvedValueOnce({ data: 'ok' })
        const { log, entries } = recordingLogger()
        const withNtfy: NotificationSettings = {
            ...settings,
            ntfy: { enabled: true, url: 'https://ntfy.example.org', topic: 'checkins' }
        }

        await new ConclusionReporter(withNtfy, log).report([alice], summarize([alice], 'run2'))

        expect(post).toHaveBeenCalledTimes(2)
        expect(post).toHaveBeenLastCalledWith(
            'https://ntfy.example.org/checkins',
            '1/1 accounts checked in, quota +500\n✓ alice @ https://anyrouter.top: checked-in, quota 1500 (+500)',
            expect.objectContaining({ headers: expect.objectContaining({ Title: 'Check-in Summary', Priority: '3' }) })
        )
        expect(entries).toContainEqual({ scope: 'main', title: 'NOTIFY', message: 'Conclusion webhook failed: HTTP 500', type: 'warn' })
    })

    it('stays silent for an empty run', async () => {
        const post = vi.spyOn(axios, 'post')
        const { log } = recordingLogger()

        await new ConclusionReporter(settings, log).report([], summarize([], 'run3'))

        expect(post).not.toHaveBeenCalled()
    })
})
