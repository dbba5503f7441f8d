import type { SiteDescriptor } from '../interface/Site'

/** Identity of an account across sites and retry rounds */
export function buildKey(site: Pick<SiteDescriptor, 'baseUrl'>, username: string): string {
    return `${site.baseUrl}::${username.trim()}`
}

export function formatLabel(site: Pick<SiteDescriptor, 'baseUrl'>, username: string): string {
    return `${username} @ ${site.baseUrl}`
}
