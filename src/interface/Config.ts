// src/interface/Config.ts

import type { Account } from './Account'
import type { SiteOverrides } from './Site'

export interface Config {
    accounts: Account[];
    settings: ConfigSettings;
}

export type DriverKind = 'browser' | 'http'

export interface ConfigSettings {
    // Pacing between accounts (seconds)
    minDelay: number;
    maxDelay: number;

    // Browser / driver
    headless: boolean;
    driver: DriverKind;
    globalTimeout: number | string;
    remoteDebugEndpoint?: string;

    // Networking / proxy (per-account proxy wins)
    proxy?: string;

    // Retry rounds
    maxRetries: number;
    retryDelayHours: number;

    // Global site overrides, plus the legacy top-level baseUrl
    site: SiteOverrides;
    baseUrl?: string;

    // Logging controls
    logging: ConfigLogging;

    // Reports & notifications
    report: ConfigReport;
    diagnostics: ConfigDiagnostics;
    webhook: ConfigWebhook;
    conclusionWebhook: ConfigWebhook;
    ntfy: ConfigNtfy;

    dryRun?: boolean;
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigLogging {
    excludeFunc: string[];             // titles to exclude from console logs
    webhookExcludeFunc: string[];      // titles to exclude from live webhook logs
    liveWebhookUrl?: string;           // dedicated live webhook target
    redactEmails?: boolean;            // mask email-like usernames in logs
}

export interface ConfigReport {
    dir: string;
    json: boolean;
    csv: boolean;
    text: boolean;
}

export interface ConfigDiagnostics {
    enabled: boolean;                  // screenshot + HTML of the page when an account fails
    dir: string;
}

export interface ConfigWebhook {
    enabled: boolean;
    url: string;
    /** Optional: custom username for webhook messages */
    username?: string;
    /** Optional: custom avatar url for webhook messages */
    avatarUrl?: string;
}

export interface ConfigNtfy {
    enabled: boolean;
    url: string;
    topic: string;
    authToken?: string; // Optional authentication token
}
