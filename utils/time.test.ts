import { describe, test, expect } from 'vitest'
import { formatDurationMs } from './time'

describe('formatDurationMs', () => {
    test('mm:ss，不足一秒捨去', () => {
        expect(formatDurationMs(0)).toBe('00:00')
        expect(formatDurationMs(4999)).toBe('00:04')
        expect(formatDurationMs(65000)).toBe('01:05')
        expect(formatDurationMs(125000)).toBe('02:05')
    })

    test('超過一小時為 h:mm:ss', () => {
        expect(formatDurationMs(3725000)).toBe('1:02:05')
    })

    test('負數視為 0', () => {
        expect(formatDurationMs(-3000)).toBe('00:00')
    })
})
