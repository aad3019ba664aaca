import { describe, test, expect } from 'vitest'
import { getLanguageLabel, getSupportedLanguages, isValidLanguageCode, normalizeLanguageCode } from '../language-utils'

describe('語言工具函數', () => {
    test('getLanguageLabel', () => {
        expect(getLanguageLabel(null)).toBe('Auto-detect')
        expect(getLanguageLabel('zh')).toBe('中文')
        expect(getLanguageLabel('de')).toBe('Deutsch')
    })

    test('isValidLanguageCode', () => {
        expect(isValidLanguageCode('ja')).toBe(true)
        expect(isValidLanguageCode('xx')).toBe(false)
        expect(isValidLanguageCode('EN')).toBe(false)
    })

    test('normalizeLanguageCode', () => {
        expect(normalizeLanguageCode('en-US')).toBe('en')
        expect(normalizeLanguageCode(' ZH_tw ')).toBe('zh')
        expect(normalizeLanguageCode('tlh')).toBeNull()
        expect(normalizeLanguageCode('')).toBeNull()
    })

    test('getSupportedLanguages', () => {
        expect(getSupportedLanguages().map(lang => lang.code)).toEqual([
            'en', 'zh', 'ja', 'ko', 'es', 'fr', 'de', 'it', 'pt', 'ru'
        ])
    })
})
