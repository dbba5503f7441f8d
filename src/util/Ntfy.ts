import axios from 'axios'

import type { ConfigNtfy } from '../interface/Config'
import type { LogLevel } from './Logger'

const NOTIFICATION_TYPES: Record<LogLevel, { priority: number; tags: string }> = {
    error: { priority: 5, tags: 'rotating_light' },
    warn: { priority: 4, tags: 'warning' },
    log: { priority: 3, tags: 'white_check_mark' }
}

/** Push one message to an ntfy topic. No-op when ntfy is disabled or incomplete. */
export async function Ntfy(ntfy: ConfigNtfy, message: string, type: LogLevel = 'log', title = 'Check-in'): Promise<void> {
    if (!ntfy.enabled || !ntfy.url || !ntfy.topic) return

    const { priority, tags } = NOTIFICATION_TYPES[type]
    const headers: Record<string, string> = {
        Title: title, // header value, ASCII only
        Priority: String(priority),
        Tags: tags,
        'Content-Type': 'text/plain; charset=utf-8'
    }
    if (ntfy.authToken) headers.Authorization = `Bearer ${ntfy.authToken}`

    await axios.post(`${ntfy.url.replace(/\/+$/, '')}/${encodeURIComponent(ntfy.topic)}`, message, { headers, timeout: 10000 })
}
