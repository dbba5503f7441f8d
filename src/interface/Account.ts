import type { SiteOverrides } from './Site'

export interface Account extends SiteOverrides {
    /** Enable/disable this account (if false, account will be skipped during execution) */
    enabled?: boolean;

    /** Login name on the target site */
    username: string;

    /** Account password, optional for oauthDelegate sites */
    password?: string;

    /** Per-account site overrides; flattened fields on the account itself take precedence */
    site?: SiteOverrides;

    /** Proxy used for this account, either a URL string or a structured proxy */
    proxy?: string | AccountProxy;

    /** Attach to an already running browser instead of launching one */
    remoteDebugEndpoint?: string;
}

export interface AccountProxy {
    /** Proxy host (hostname, IP or full URL) */
    url: string;

    /** Proxy port */
    port?: number;

    /** Proxy authentication username */
    username?: string;

    /** Proxy authentication password */
    password?: string;
}
