/**
 * 將毫秒格式化為 mm:ss，超過一小時為 h:mm:ss，給錄音長度日誌使用
 */
export function formatDurationMs(ms: number): string {
    return formatTime(ms / 1000)
}

function formatTime(totalSeconds: number): string {
    const safe = Math.max(0, Math.floor(totalSeconds))
    const hours = Math.floor(safe / 3600)
    const minutes = Math.floor((safe % 3600) / 60)
    const seconds = safe % 60
    const mm = String(minutes).padStart(2, '0')
    const ss = String(seconds).padStart(2, '0')
    return hours > 0 ? `${hours}:${mm}:${ss}` : `${mm}:${ss}`
}
