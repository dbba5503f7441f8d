import path from 'path'
import type { Page } from 'rebrowser-playwright'
import { load } from 'cheerio'

import { SELECTORS } from '../constants'
import type { Logger } from '../util/Logger'

/** Visible text of an HTML document, whitespace collapsed, without scripts and styles */
export function extractPageText(html: string): string {
    const $ = load(html)
    $('script, style, noscript, template').remove()
    return $('body').text().replace(/\s+/g, ' ').trim()
}

export function isNetworkErrorPage(html: string): boolean {
    const $ = load(html)
    return $('body.neterror').length > 0
}

/** `<dir>/<YYYY-MM-DD>/<HHMMSS>_<name>` in local time, without an extension */
export function diagnosticsBasePath(dir: string, name: string, at: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0')
    const day = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`
    const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
    const safe = name.replace(/[^a-z0-9-_]/gi, '_').slice(0, 64)
    return path.join(path.resolve(dir), day, `${time}_${safe}`)
}

export default class BrowserUtil {
    constructor(private readonly log: Logger) { }

    /**
     * Close announcement modals that cover the console. Close buttons first, then a click outside
     * the dialog when only the mask is left, then Escape.
     */
    async dismissModals(page: Page, scope: string): Promise<number> {
        const maxRounds = 3
        let total = 0
        for (let round = 0; round < maxRounds; round++) {
            const dismissed = await this.dismissRound(page, scope)
            total += dismissed
            if (dismissed === 0) break
        }
        return total
    }

    private async dismissRound(page: Page, scope: string): Promise<number> {
        for (const selector of SELECTORS.closeModal) {
            const button = page.locator(selector).first()
            const visible = await button.isVisible().catch(() => false)
            if (!visible) continue

            const clicked = await button.click({ timeout: 1000 }).then(() => true, () => false)
            if (clicked) {
                this.log(scope, 'DISMISS-MODAL', `Dismissed: ${selector}`)
                await page.waitForTimeout(500)
                return 1
            }
        }

        const mask = page.locator(SELECTORS.modalMask).first()
        if (await mask.isVisible().catch(() => false)) {
            await page.mouse.click(10, 10)
            await page.keyboard.press('Escape')
            this.log(scope, 'DISMISS-MODAL', 'Dismissed: modal mask')
            await page.waitForTimeout(500)
            return 1
        }

        return 0
    }

    /**
     * Reload pages showing the Chromium network error page.
     */
    async reloadBadPage(page: Page, scope: string): Promise<void> {
        const html = await page.content()
        if (isNetworkErrorPage(html)) {
            this.log(scope, 'RELOAD-BAD-PAGE', 'Bad page detected, reloading!', 'warn')
            await page.reload()
        }
    }
}
