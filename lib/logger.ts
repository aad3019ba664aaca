/**
 * 服務日誌介面 - 沿用 console 的呼叫方式
 */
export type ServiceLogger = Pick<Console, 'log' | 'warn' | 'error'>

const noop = (): void => undefined

/**
 * 未開啟除錯日誌時只保留 error
 */
export function createServiceLogger(enableDebugLogging: boolean): ServiceLogger {
    if (enableDebugLogging) {
        return console
    }
    return {
        log: noop,
        warn: noop,
        error: (...args: unknown[]) => console.error(...args),
    }
}

// 測試用
export const silentLogger: ServiceLogger = {
    log: noop,
    warn: noop,
    error: noop,
}
