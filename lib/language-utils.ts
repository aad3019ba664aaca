/**
 * 語言管理工具函數
 */

import { LanguageCode, SUPPORTED_LANGUAGES } from '../types/language'

/**
 * 取得語言選項的顯示標籤，null 表示自動偵測
 */
export function getLanguageLabel(code: LanguageCode | null): string {
    if (code === null) {
        return 'Auto-detect'
    }
    const option = SUPPORTED_LANGUAGES.find(lang => lang.code === code)
    return option ? option.nativeLabel : code
}

/**
 * 檢查語言代碼是否有效
 */
export function isValidLanguageCode(code: string): code is LanguageCode {
    return SUPPORTED_LANGUAGES.some(lang => lang.code === code)
}

/**
 * 將 "en-US"、"ZH" 之類的輸入正規化為支援的語言代碼
 */
export function normalizeLanguageCode(input: string): LanguageCode | null {
    const base = input.trim().toLowerCase().split(/[-_]/)[0]
    return base !== undefined && isValidLanguageCode(base) ? base : null
}

/**
 * 取得所有支援的語言選項
 */
export function getSupportedLanguages() {
    return SUPPORTED_LANGUAGES
}
