import axios from 'axios'

import { DISCORD } from '../constants'
import type { ConfigSettings, ConfigWebhook } from '../interface/Config'
import type { AccountResult, RunSummary } from '../interface/Result'
import { errorMessage } from './Errors'
import type { Logger } from './Logger'
import { Ntfy } from './Ntfy'
import type { Reporter } from './Report'

export interface EmbedField {
    name: string;
    value: string;
    inline?: boolean;
}

type NotificationSettings = Pick<ConfigSettings, 'webhook' | 'conclusionWebhook' | 'ntfy'>

const DEFAULT_USERNAME = 'Check-in Summary'
const MAX_FIELDS = 25
const MAX_FIELD_VALUE = 1024

function targets(settings: NotificationSettings): ConfigWebhook[] {
    const hooks: ConfigWebhook[] = []
    for (const hook of [settings.conclusionWebhook, settings.webhook]) {
        if (hook.enabled && hook.url && !hooks.some(h => h.url === hook.url)) hooks.push(hook)
    }
    return hooks
}

/**
 * Post one embed to every enabled webhook (conclusion webhook first, the general webhook
 * when it points elsewhere).
 */
export async function ConclusionWebhook(
    settings: NotificationSettings,
    title: string,
    description: string,
    fields: EmbedField[] = [],
    color: number = DISCORD.COLOR_BLUE
): Promise<void> {
    for (const hook of targets(settings)) {
        await axios.post(hook.url, {
            username: hook.username || DEFAULT_USERNAME,
            avatar_url: hook.avatarUrl || DISCORD.AVATAR_URL || undefined,
            embeds: [{
                title,
                description: description.slice(0, DISCORD.MAX_EMBED_LENGTH),
                color,
                fields: fields.slice(0, MAX_FIELDS),
                timestamp: new Date().toISOString()
            }]
        }, { headers: { 'Content-Type': 'application/json' }, timeout: DISCORD.WEBHOOK_TIMEOUT })
    }
}

function accountLine(result: AccountResult): string {
    if (result.success) {
        const delta = result.quotaDelta > 0 ? ` (+${result.quotaDelta})` : ''
        return `✓ ${result.label}: ${result.checkin}, quota ${result.quotaRemaining}${delta}`
    }
    return `✗ ${result.label}: ${result.message}`
}

export function buildConclusion(results: AccountResult[], summary: RunSummary): { description: string, fields: EmbedField[], color: number } {
    const color = summary.failed === 0 ? DISCORD.COLOR_GREEN : (summary.succeeded === 0 ? DISCORD.COLOR_CRIMSON : DISCORD.COLOR_ORANGE)
    const description = [
        `**Run:** ${summary.runId}`,
        `**Accounts:** ${summary.total}`,
        `**Succeeded:** ${summary.succeeded}`,
        `**Failed:** ${summary.failed}`,
        `**Quota gained:** ${summary.quotaGained}`
    ].join('\n')

    const fields: EmbedField[] = []
    const details = results.map(accountLine).join('\n')
    if (details) {
        fields.push({ name: 'Accounts', value: details.slice(0, MAX_FIELD_VALUE) })
    }
    return { description, fields, color }
}

/** Final run notification to the Discord webhooks and ntfy */
export class ConclusionReporter implements Reporter {
    constructor(
        private readonly settings: NotificationSettings,
        private readonly log: Logger
    ) { }

    async report(results: AccountResult[], summary: RunSummary): Promise<void> {
        if (summary.total === 0) return
        const { description, fields, color } = buildConclusion(results, summary)

        if (targets(this.settings).length > 0) {
            try {
                await ConclusionWebhook(this.settings, 'Check-in Summary', description, fields, color)
                this.log('main', 'NOTIFY', 'Conclusion webhook sent')
            } catch (error) {
                this.log('main', 'NOTIFY', `Conclusion webhook failed: ${errorMessage(error)}`, 'warn')
            }
        }

        if (this.settings.ntfy.enabled) {
            const text = [
                `${summary.succeeded}/${summary.total} accounts checked in, quota +${summary.quotaGained}`,
                ...results.map(accountLine)
            ].join('\n')
            try {
                await Ntfy(this.settings.ntfy, text, summary.failed > 0 ? 'warn' : 'log', 'Check-in Summary')
                this.log('main', 'NOTIFY', 'ntfy notification sent')
            } catch (error) {
                this.log('main', 'NOTIFY', `ntfy notification failed: ${errorMessage(error)}`, 'warn')
            }
        }
    }
}
