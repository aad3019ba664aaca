/**
 * 轉錄語言的類型定義和常數
 */

export type LanguageCode = 'en' | 'zh' | 'ja' | 'ko' | 'es' | 'fr' | 'de' | 'it' | 'pt' | 'ru'

export interface LanguageOption {
    code: LanguageCode
    label: string
    nativeLabel: string
}

export const SUPPORTED_LANGUAGES: readonly LanguageOption[] = [
    { code: 'en', label: 'English', nativeLabel: 'English' },
    { code: 'zh', label: 'Chinese', nativeLabel: '中文' },
    { code: 'ja', label: 'Japanese', nativeLabel: '日本語' },
    { code: 'ko', label: 'Korean', nativeLabel: '한국어' },
    { code: 'es', label: 'Spanish', nativeLabel: 'Español' },
    { code: 'fr', label: 'French', nativeLabel: 'Français' },
    { code: 'de', label: 'German', nativeLabel: 'Deutsch' },
    { code: 'it', label: 'Italian', nativeLabel: 'Italiano' },
    { code: 'pt', label: 'Portuguese', nativeLabel: 'Português' },
    { code: 'ru', label: 'Russian', nativeLabel: 'Русский' },
] as const

// null 代表由模型自動偵測
export const DEFAULT_LANGUAGE: LanguageCode | null = null
