export interface TokenRecord {
    name: string;
    /** Secret material with the scheme prefix removed */
    key: string;
    /** Smallest currency unit */
    remainingQuota: number;
    usedQuota: number;
    status: number;
    /** Epoch seconds */
    expiredAt: number;
    createdAt: number;
}

export interface UserInfo {
    userId?: number;
    quota?: number;
}

export interface ApiOutcome {
    success: boolean;
    message: string;
}
