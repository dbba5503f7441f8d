import { beforeEach, describe, expect, it, vi } from 'vitest'

import { HttpDriver } from '../src/browser/HttpDriver'
import { SELECTORS } from '../src/constants'
import { CheckinWorkflow } from '../src/functions/Checkin'
import { resolveSite, siteUrl } from '../src/util/Site'
import { FakeUtil, MemorySessionStore, recordingLogger } from './helpers'

interface FakeResponse {
    status: number;
    data: string;
    headers: Record<string, string | string[]>;
}

interface RequestConfig {
    url?: string;
    method?: string;
    data?: unknown;
    headers?: Record<string, string>;
}

const { request } = vi.hoisted(() => ({ request: vi.fn<(config: RequestConfig) => Promise<FakeResponse>>() }))

vi.mock('../src/util/Axios', () => ({
    default: class {
        request = request
    }
}))

const site = resolveSite({}, { username: 'alice' })
const LOGIN_API = 'https://anyrouter.top/api/user/login?turnstile='

const reply = (data: unknown, status = 200, headers: Record<string, string | string[]> = {}): FakeResponse => ({
    status,
    data: typeof data === 'string' ? data : JSON.stringify(data),
    headers
})

describe('HttpDriver', () => {
    const { log } = recordingLogger()
    let driver: HttpDriver

    beforeEach(() => {
        request.mockReset()
        driver = new HttpDriver(log)
    })

    it('logs in through the API with the cookies from the login page', async () => {
        request
            .mockResolvedValueOnce(reply('<html><body><h1>Login</h1><script>boot()</script></body></html>', 200, { 'set-cookie': ['acw_tc=abc; Path=/; HttpOnly'] }))
            .mockResolvedValueOnce(reply({ success: true, data: { id: 42, username: 'alice' } }, 200, { 'set-cookie': 'session=xyz; Path=/' }))
            .mockResolvedValueOnce(reply({ success: true, data: { id: 42, quota: 10 } }))
        const session = await driver.open(site, {})

        await driver.navigate(session, siteUrl(site, site.loginPath))
        expect(await driver.pageText(session)).toBe('Login')

        expect(await driver.fill(session, SELECTORS.usernameInput, 'alice')).toBe(true)
        expect(await driver.fill(session, SELECTORS.passwordInput, 's3cr3t-a')).toBe(true)
        expect(await driver.fill(session, ['.remember-me'], 'on')).toBe(false)
        expect(await driver.findAndAct(session, SELECTORS.loginButton, 'click')).toEqual({ found: false, enabled: false, label: '', acted: false })

        await driver.press(session, 'Enter')

        expect(request).toHaveBeenNthCalledWith(2, expect.objectContaining({
            url: LOGIN_API,
            method: 'POST',
            data: { username: 'alice', password: 's3cr3t-a' },
            headers: expect.objectContaining({ Cookie: 'acw_tc=abc', 'New-Api-User': '-1', 'Content-Type': 'application/json' })
        }))
        expect(session.userId).toBe(42)
        expect(await driver.currentUrl(session)).toBe('https://anyrouter.top/console')

        const payload = await driver.callApiInPage(session, siteUrl(site, site.userApiPath), 'GET')
        expect(payload).toEqual({ success: true, data: { id: 42, quota: 10 } })
        expect(request).toHaveBeenLastCalledWith(expect.objectContaining({
            headers: expect.objectContaining({ Cookie: 'acw_tc=abc; session=xyz', 'New-Api-User': '42' })
        }))
    })

    it('exposes a refused login as page text', async () => {
        request.mockResolvedValueOnce(reply({ success: false, message: '用户名或密码错误' }, 401))
        const session = await driver.open(site, {})
        await driver.fill(session, SELECTORS.usernameInput, 'alice')
        await driver.fill(session, SELECTORS.passwordInput, 'wrong-pw')

        await driver.press(session, 'Enter')

        expect(await driver.pageText(session)).toBe('用户名或密码错误')
        expect(session.userId).toBe(-1)
        expect(await driver.currentUrl(session)).toBe('about:blank')
    })

    it('saves and restores cookies and the user id', async () => {
        request.mockResolvedValueOnce(reply('', 200, { 'set-cookie': ['session=xyz; Path=/', 'lang=zh'] }))
        const session = await driver.open(site, {})
        await driver.navigate(session, siteUrl(site, site.consolePath))
        session.userId = 7

        const blob = await driver.saveSessionState(session)
        expect(blob).toEqual({ cookies: { session: 'xyz', lang: 'zh' }, userId: 7 })

        const fresh = await driver.restoreSessionState(await driver.open(site, {}), blob)
        expect([...fresh.cookies]).toEqual([['session', 'xyz'], ['lang', 'zh']])
        expect(fresh.userId).toBe(7)
    })

    it('runs a whole check-in without a browser', async () => {
        let quota = 1000
        request.mockImplementation(async (config) => {
            const url = config.url ?? ''
            if (url === LOGIN_API) return reply({ success: true, data: { id: 42 } }, 200, { 'set-cookie': 'session=xyz' })
            if (url.endsWith('/api/user/self')) return reply({ success: true, data: { id: 42, quota } })
            if (url.includes('/api/token/')) return reply({ success: true, data: { items: [{ name: 'main', key: 'sk-k1', remain_quota: 900 }] } })
            if (url.endsWith('/api/user/sign_in')) {
                quota += 250
                return reply({ success: true, message: '签到成功' })
            }
            return reply('<html><body>new api</body></html>')
        })
        const utils = new FakeUtil()
        const workflow = new CheckinWorkflow({ driver, log, utils, sessionStore: new MemorySessionStore() })

        const result = await workflow.run({ username: 'alice', password: 's3cr3t-a' }, { site: {} })

        expect(result.success).toBe(true)
        expect(result.checkin).toBe('checked-in')
        expect(result.userId).toBe(42)
        expect(result.quotaBefore).toBe(1000)
        expect(result.quotaRemaining).toBe(1250)
        expect(result.quotaDelta).toBe(250)
        expect(result.tokens.map(t => [t.name, t.key, t.remainingQuota])).toEqual([['main', 'k1', 900]])
    })
})
