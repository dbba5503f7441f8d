import type { AccountProxy } from './Account'
import type { SiteDescriptor } from './Site'

export type WaitCondition = 'load' | 'domcontentloaded' | 'networkidle'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

/** Opaque, driver-defined serialized authentication state */
export type SessionBlob = Record<string, unknown>

export interface OpenOptions {
    proxy?: string | AccountProxy;
    remoteDebugEndpoint?: string;
}

export interface ActionOutcome {
    /** An element matching one of the candidates was present */
    found: boolean;
    /** The element was interactive (not disabled) */
    enabled: boolean;
    /** Visible text/label of the element, empty when not found */
    label: string;
    /** The requested action was performed without error */
    acted: boolean;
}

export type ElementAction = 'click' | 'inspect'

/**
 * Page/session capability consumed by the check-in workflow. Concrete drivers own all
 * environment specific heuristics (selector probing, modal dismissal, anti-bot knobs).
 */
export interface SessionDriver<S = unknown> {
    /** Whether sessions are opened without a visible window (no human can interact) */
    readonly headless: boolean;

    open(site: SiteDescriptor, options: OpenOptions): Promise<S>;
    navigate(session: S, url: string, waitUntil?: WaitCondition): Promise<void>;
    currentUrl(session: S): Promise<string>;
    /** Fill the first matching input; false when none matched */
    fill(session: S, selectors: readonly string[], value: string): Promise<boolean>;
    findAndAct(session: S, selectors: readonly string[], action: ElementAction): Promise<ActionOutcome>;
    press(session: S, key: string): Promise<void>;
    pageText(session: S): Promise<string>;
    evaluateAuthenticated(session: S, probeUrl: string): Promise<boolean>;
    callApiInPage(session: S, url: string, method: HttpMethod, body?: unknown, headers?: Record<string, string>): Promise<unknown>;
    saveSessionState?(session: S): Promise<SessionBlob>;
    /** May hand back a different session; the caller then owns that one and closes it */
    restoreSessionState(session: S, blob: SessionBlob): Promise<S>;
    /** Keep whatever shows the page's current state (screenshot, HTML) for a failed account */
    captureDiagnostics?(session: S, name: string): Promise<void>;
    close(session: S): Promise<void>;
}

export interface SessionStore {
    load(location: string): Promise<SessionBlob | null>;
    save(location: string, blob: SessionBlob): Promise<void>;
}
