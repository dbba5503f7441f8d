import type { ApiOutcome, TokenRecord, UserInfo } from '../interface/Token'
import { isRecord } from './Utils'

// Token-list endpoints differ per deployment; every field has a list of accepted names, canonical name first.
const KEY_FIELDS = ['key', 'token', 'access_token', 'accessToken', 'api_key', 'apiKey', 'secret', 'value']
const NAME_FIELDS = ['name', 'token_name', 'tokenName', 'label', 'title']
const REMAINING_FIELDS = ['remainingQuota', 'remain_quota', 'remaining_quota', 'remainQuota', 'quota', 'balance']
const USED_FIELDS = ['usedQuota', 'used_quota', 'used']
const STATUS_FIELDS = ['status', 'state']
const EXPIRED_FIELDS = ['expiredAt', 'expired_time', 'expired_at', 'expires_at', 'expiredTime']
const CREATED_FIELDS = ['createdAt', 'created_time', 'created_at', 'createdTime']

const WRAPPER_KEYS = ['data', 'list', 'items', 'rows', 'tokens', 'records']

const MAX_DEPTH = 4
const KEY_PREFIX = 'sk-'

/** Best-effort integer: floats truncate, numeric strings parse, anything else is the fallback */
export function toInt(value: unknown, fallback = 0): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : fallback
    }
    if (typeof value === 'string' && value.trim()) {
        const n = Number(value.trim())
        return Number.isFinite(n) ? Math.trunc(n) : fallback
    }
    return fallback
}

function toQuota(value: unknown): number {
    return Math.max(0, toInt(value))
}

function firstPresent(item: Record<string, unknown>, fields: readonly string[]): unknown {
    for (const field of fields) {
        const value = item[field]
        if (value === null || value === undefined) continue
        if (typeof value === 'string' && !value.trim()) continue
        return value
    }
    return undefined
}

function stripPrefix(key: string): string {
    const trimmed = key.trim()
    return trimmed.startsWith(KEY_PREFIX) ? trimmed.slice(KEY_PREFIX.length) : trimmed
}

// Records already in TokenRecord shape carry a decoded key
function isCanonical(item: Record<string, unknown>): boolean {
    return typeof item.key === 'string' && typeof item.remainingQuota === 'number' && typeof item.usedQuota === 'number'
}

function looksLikeToken(item: Record<string, unknown>): boolean {
    const key = firstPresent(item, KEY_FIELDS)
    if (typeof key === 'string') return true
    return firstPresent(item, REMAINING_FIELDS) !== undefined || firstPresent(item, USED_FIELDS) !== undefined
}

function normalizeItem(item: unknown, index: number): TokenRecord | null {
    const fallbackName = `token_${index + 1}`

    if (typeof item === 'string') {
        const key = stripPrefix(item)
        if (!key) return null
        return { name: fallbackName, key, remainingQuota: 0, usedQuota: 0, status: 0, expiredAt: 0, createdAt: 0 }
    }
    if (!isRecord(item)) return null

    const rawKey = firstPresent(item, KEY_FIELDS)
    const rawName = firstPresent(item, NAME_FIELDS)

    return {
        name: typeof rawName === 'string' ? rawName.trim() : (typeof rawName === 'number' ? String(rawName) : fallbackName),
        key: typeof rawKey !== 'string' ? '' : isCanonical(item) ? rawKey : stripPrefix(rawKey),
        remainingQuota: toQuota(firstPresent(item, REMAINING_FIELDS)),
        usedQuota: toQuota(firstPresent(item, USED_FIELDS)),
        status: toInt(firstPresent(item, STATUS_FIELDS)),
        expiredAt: toInt(firstPresent(item, EXPIRED_FIELDS)),
        createdAt: toInt(firstPresent(item, CREATED_FIELDS))
    }
}

function normalizeList(items: unknown[]): TokenRecord[] {
    const records: TokenRecord[] = []
    items.forEach((item, index) => {
        const record = normalizeItem(item, index)
        if (record) records.push(record)
    })
    return records
}

function extract(payload: unknown, depth: number): TokenRecord[] {
    if (depth > MAX_DEPTH) return []

    if (Array.isArray(payload)) return normalizeList(payload)

    if (typeof payload === 'string') {
        const text = payload.trim()
        if (!text) return []
        // JSON bodies returned as text
        if ((text.startsWith('{') || text.startsWith('[')) && depth < MAX_DEPTH) {
            try {
                return extract(JSON.parse(text), depth + 1)
            } catch {
                return []
            }
        }
        return normalizeList([text])
    }

    if (!isRecord(payload)) return []

    for (const wrapper of WRAPPER_KEYS) {
        const inner = payload[wrapper]
        if (Array.isArray(inner) || isRecord(inner)) {
            const found = extract(inner, depth + 1)
            if (found.length > 0) return found
        }
    }

    if (looksLikeToken(payload)) return normalizeList([payload])

    return []
}

/**
 * Canonical token list from whatever a balance/token endpoint returned.
 * Total: unknown shapes give an empty list.
 */
export function normalizeTokens(payload: unknown): TokenRecord[] {
    try {
        return extract(payload, 0)
    } catch {
        return []
    }
}

/** Reads `{ data: { id, quota } }` (or the same fields at the top level) */
export function normalizeUserInfo(payload: unknown): UserInfo {
    if (!isRecord(payload)) return {}
    const source = isRecord(payload.data) ? payload.data : payload

    const info: UserInfo = {}
    const id = toInt(source.id, NaN)
    if (Number.isFinite(id)) info.userId = id
    const quotaRaw = firstPresent(source, ['quota', 'remain_quota', 'balance'])
    if (quotaRaw !== undefined) info.quota = toQuota(quotaRaw)
    return info
}

/** `{ success, message }` envelope; anything else counts as a failure */
export function readApiOutcome(payload: unknown): ApiOutcome {
    if (typeof payload === 'string') {
        return { success: false, message: payload.trim().slice(0, 200) }
    }
    if (!isRecord(payload)) return { success: false, message: 'empty response' }
    const message = typeof payload.message === 'string' ? payload.message : (typeof payload.msg === 'string' ? payload.msg : '')
    return { success: payload.success === true, message }
}
