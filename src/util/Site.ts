import os from 'os'
import path from 'path'

import { DEFAULT_SITE } from '../constants'
import { isRecord } from './Utils'
import type { Account } from '../interface/Account'
import type { AuthMode, SiteDescriptor, SiteOverrides } from '../interface/Site'

export interface SiteSettings {
    site?: SiteOverrides | null;
    /** Legacy top-level base URL */
    baseUrl?: string | null;
}

const OVERRIDE_FIELDS = [
    'name',
    'baseUrl',
    'loginPath',
    'consolePath',
    'checkinApiPath',
    'userApiPath',
    'tokensApiPath',
    'authMode',
    'oauthEntryPath',
    'oauthButtonLabel',
    'manualAuthTimeoutSeconds',
    'savedSessionPath'
] as const satisfies ReadonlyArray<keyof SiteOverrides>

const OAUTH_ALIASES = new Set(['oauthdelegate', 'oauth_delegate', 'oauth-delegate', 'oauth', 'delegate'])

const SCHEME_RE = /^[a-z][a-z0-9+.-]*:\/\//i

type Layer = Record<string, unknown>

function isPresent(value: unknown): boolean {
    if (value === null || value === undefined) return false
    if (typeof value === 'string') return value.trim().length > 0
    return true
}

function overlay(target: Layer, source: unknown) {
    if (!isRecord(source)) return
    for (const field of OVERRIDE_FIELDS) {
        if (isPresent(source[field])) target[field] = source[field]
    }
}

function asText(value: unknown, fallback: string): string {
    if (typeof value === 'string' && value.trim()) return value.trim()
    if (typeof value === 'number' && Number.isFinite(value)) return String(value)
    return fallback
}

export function normalizeBaseUrl(raw: string): string {
    let url = raw.trim()
    if (!SCHEME_RE.test(url)) {
        url = `https://${url.replace(/^\/+/, '')}`
    }
    url = url.replace(/\/+$/, '')
    // Nothing left after the scheme
    if (!/^[a-z][a-z0-9+.-]*:\/\/[^/]/i.test(url)) return DEFAULT_SITE.baseUrl
    return url
}

export function normalizePath(raw: unknown, fallback: string): string {
    const value = asText(raw, '')
    if (!value) return fallback
    if (SCHEME_RE.test(value)) return value
    return value.startsWith('/') ? value : `/${value}`
}

export function normalizeAuthMode(raw: unknown): AuthMode {
    const mode = asText(raw, DEFAULT_SITE.authMode).toLowerCase()
    return OAUTH_ALIASES.has(mode) ? 'oauthDelegate' : 'local'
}

function toTimeoutSeconds(raw: unknown): number {
    const n = typeof raw === 'number' ? raw : parseInt(asText(raw, ''), 10)
    if (!Number.isFinite(n) || n <= 0) return DEFAULT_SITE.manualAuthTimeoutSeconds
    return Math.trunc(n)
}

function resolveSessionPath(raw: unknown): string | null {
    const value = asText(raw, '')
    if (!value) return null
    const expanded = value === '~' || value.startsWith('~/')
        ? path.join(os.homedir(), value.slice(1))
        : value
    return path.resolve(expanded)
}

function hostOf(baseUrl: string): string {
    try {
        return new URL(baseUrl).host || baseUrl
    } catch {
        return baseUrl.replace(SCHEME_RE, '')
    }
}

/**
 * Merge built-in defaults, global settings and account overrides into one site descriptor.
 * Never throws: anything unusable falls back to the defaults.
 */
export function resolveSite(settings: SiteSettings | null | undefined, account: Partial<Account> | null | undefined): SiteDescriptor {
    const merged: Layer = { ...DEFAULT_SITE }

    overlay(merged, settings?.site)
    if (isPresent(settings?.baseUrl)) merged.baseUrl = settings?.baseUrl
    overlay(merged, account?.site)
    overlay(merged, account)

    const baseUrl = normalizeBaseUrl(asText(merged.baseUrl, DEFAULT_SITE.baseUrl))

    return Object.freeze({
        name: asText(merged.name, hostOf(baseUrl)),
        baseUrl,
        loginPath: normalizePath(merged.loginPath, DEFAULT_SITE.loginPath),
        consolePath: normalizePath(merged.consolePath, DEFAULT_SITE.consolePath),
        checkinApiPath: normalizePath(merged.checkinApiPath, DEFAULT_SITE.checkinApiPath),
        userApiPath: normalizePath(merged.userApiPath, DEFAULT_SITE.userApiPath),
        tokensApiPath: normalizePath(merged.tokensApiPath, DEFAULT_SITE.tokensApiPath),
        oauthEntryPath: normalizePath(merged.oauthEntryPath, DEFAULT_SITE.oauthEntryPath),
        authMode: normalizeAuthMode(merged.authMode),
        oauthButtonLabel: asText(merged.oauthButtonLabel, DEFAULT_SITE.oauthButtonLabel),
        manualAuthTimeoutSeconds: toTimeoutSeconds(merged.manualAuthTimeoutSeconds),
        savedSessionPath: resolveSessionPath(merged.savedSessionPath)
    })
}

/** Absolute URL for one of the descriptor's path fields */
export function siteUrl(site: SiteDescriptor, pathOrUrl: string): string {
    if (SCHEME_RE.test(pathOrUrl)) return pathOrUrl
    return `${site.baseUrl}${pathOrUrl.startsWith('/') ? '' : '/'}${pathOrUrl}`
}
