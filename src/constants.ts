export const DEFAULT_SITE = {
    baseUrl: 'https://anyrouter.top',
    loginPath: '/login',
    consolePath: '/console',
    checkinApiPath: '/api/user/sign_in',
    userApiPath: '/api/user/self',
    tokensApiPath: '/api/token/?p=0&size=100',
    authMode: 'local',
    oauthEntryPath: '/login',
    oauthButtonLabel: 'GitHub',
    manualAuthTimeoutSeconds: 180
} as const

export const TIMEOUTS = {
    LOGIN_CONFIRM: 30000,
    AUTH_POLL_INTERVAL: 2000,
    NAVIGATION: 60000,
    ELEMENT_VISIBLE: 2000,
    SETTLE_MIN: 1000,
    SETTLE_MAX: 3000
} as const

// Util.wait never sleeps longer than a week
export const MAX_RETRY_DELAY_HOURS = 168

export const SELECTORS = {
    usernameInput: [
        'input[name="username"]',
        'input[placeholder*="用户名"]',
        'input[placeholder*="账号"]',
        'input[type="text"]'
    ],
    passwordInput: [
        'input[name="password"]',
        'input[type="password"]'
    ],
    loginButton: [
        'button[type="submit"]',
        'button:has-text("登录")',
        'button:has-text("登 录")',
        'button:has-text("Login")',
        '.login-btn',
        '[class*="login"] button'
    ],
    checkinButton: [
        'button:has-text("签到")',
        'button:has-text("Sign")',
        'button:has-text("Check")',
        '[class*="checkin"]',
        '[class*="sign"]'
    ],
    closeModal: [
        '.semi-modal-close',
        '[aria-label="close"]',
        '[aria-label="Close"]',
        'button:has-text("关闭")',
        'button:has-text("Close")',
        'button:has-text("确定")',
        'button:has-text("OK")',
        'button:has-text("我知道了")',
        'button:has-text("知道了")',
        '.modal-close',
        '.close-btn'
    ],
    modalMask: '.semi-modal-mask, .modal-mask, .overlay'
} as const

export function oauthButtonSelectors(label: string): string[] {
    return [
        `button:has-text("${label}")`,
        `a:has-text("${label}")`,
        `[role="button"]:has-text("${label}")`
    ]
}

/** Check-in endpoint/button phrasing meaning "already done today" */
export const ALREADY_CHECKED_IN = /已签到|已经签到|今日已签|already\s+(checked|signed)[\s-]?in/i

/** Page text shown when the site rejects a username/password login */
export const LOGIN_REJECTED = /用户名或密码错误|密码错误|用户不存在|账号已被禁用|invalid\s+(username|password|credentials)|incorrect\s+(username|password)/i

/** Page text shown after a successful UI check-in */
export const CHECKIN_SUCCESS_INDICATORS = ['签到成功', '已签到', 'success', '获得']

/** Substrings marking template/placeholder credentials */
export const PLACEHOLDER_MARKERS = [
    '账号', '密码', 'username', 'password', 'your_',
    'example', 'test', 'xxx', 'user', 'pass',
    '用户名', '你的'
]

export const DISCORD = {
    MAX_EMBED_LENGTH: 1900,
    RATE_LIMIT_DELAY: 500,
    WEBHOOK_TIMEOUT: 10000,
    DEBOUNCE_DELAY: 750,
    COLOR_RED: 0xFF0000,
    COLOR_CRIMSON: 0xDC143C,
    COLOR_ORANGE: 0xFFA500,
    COLOR_BLUE: 0x3498DB,
    COLOR_GREEN: 0x00D26A,
    AVATAR_URL: ''
} as const
