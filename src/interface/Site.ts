export type AuthMode = 'local' | 'oauthDelegate'

export interface SiteDescriptor {
    readonly name: string;
    /** Absolute, with scheme, without trailing slash */
    readonly baseUrl: string;
    readonly loginPath: string;
    readonly consolePath: string;
    readonly checkinApiPath: string;
    readonly userApiPath: string;
    readonly tokensApiPath: string;
    readonly authMode: AuthMode;
    readonly oauthEntryPath: string;
    readonly oauthButtonLabel: string;
    readonly manualAuthTimeoutSeconds: number;
    /** Absolute location of the saved session blob, null when sessions are not persisted */
    readonly savedSessionPath: string | null;
}

/**
 * Raw, user-provided overrides. Values come from JSON so every field is loosely typed
 * and normalized by the resolver.
 */
export interface SiteOverrides {
    name?: string | null;
    baseUrl?: string | null;
    loginPath?: string | null;
    consolePath?: string | null;
    checkinApiPath?: string | null;
    userApiPath?: string | null;
    tokensApiPath?: string | null;
    authMode?: string | null;
    oauthEntryPath?: string | null;
    oauthButtonLabel?: string | null;
    manualAuthTimeoutSeconds?: number | string | null;
    savedSessionPath?: string | null;
}
