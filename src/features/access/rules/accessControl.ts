import { logger } from '../../../platform/logger.js';

const COMPONENT = 'AccessControl';

export const RATE_LIMIT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;
export const RATE_LIMIT_ENTRY_MAX_AGE_MS = 60 * 1000;

/**
 * 白名单为空时所有人可用
 */
export function isAllowed(chatId: string, allowedUsers: ReadonlySet<string>): boolean {
    if (allowedUsers.size === 0) return true;
    const allowed = allowedUsers.has(chatId);
    if (!allowed) {
        logger.warn({ kind: 'sys', component: COMPONENT, message: 'Unauthorized access attempt', meta: { chatId } });
    }
    return allowed;
}

/**
 * 管理员列表为空时所有人都是管理员
 */
export function isAdmin(chatId: string, adminUsers: ReadonlySet<string>): boolean {
    return adminUsers.size === 0 || adminUsers.has(chatId);
}

/**
 * 每个 chat 两次 prompt 之间的最小间隔
 */
export class RateLimiter {
    private lastSeen: Map<string, number> = new Map();
    private sweepTimer: NodeJS.Timeout | null = null;

    constructor(
        private readonly windowMs: number,
        private readonly now: () => number = Date.now
    ) {}

    /**
     * 允许时记录本次时间并返回 true
     */
    tryAcquire(chatId: string): boolean {
        const now = this.now();
        const last = this.lastSeen.get(chatId);
        if (last !== undefined && now - last < this.windowMs) {
            return false;
        }
        this.lastSeen.set(chatId, now);
        return true;
    }

    /**
     * 清理超过 maxAgeMs 未活动的记录
     * @returns 剩余记录数
     */
    sweep(maxAgeMs: number = RATE_LIMIT_ENTRY_MAX_AGE_MS): number {
        const threshold = this.now() - maxAgeMs;
        for (const [chatId, last] of this.lastSeen) {
            if (last < threshold) {
                this.lastSeen.delete(chatId);
            }
        }
        return this.lastSeen.size;
    }

    start(intervalMs: number = RATE_LIMIT_SWEEP_INTERVAL_MS): void {
        if (this.sweepTimer) return;
        this.sweepTimer = setInterval(() => {
            const remaining = this.sweep();
            logger.debug({ kind: 'sys', component: COMPONENT, message: 'Rate limit sweep completed', meta: { remaining } });
        }, intervalMs);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }
}
