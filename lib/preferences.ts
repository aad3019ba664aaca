import { isValidLanguageCode } from './language-utils'
import { MAX_TIMER_DELAY_MS } from './config'
import type { DictationConfig } from './config'
import type { LanguageCode } from '../types/language'

/**
 * 外部持久化的鍵值儲存
 */
export interface PreferenceStore {
    get(key: string): string | null
    set(key: string, value: string): void
    remove(key: string): void
}

export const PREFERENCE_KEYS = {
    SELECTED_MODEL_ID: 'selectedModelId',
    GLOBAL_HOTKEY: 'globalHotkey',
    SELECTED_LANGUAGE: 'selectedLanguage',
    MAX_RECORDING_DURATION: 'maxRecordingDuration',
} as const

export type PreferenceKey = typeof PREFERENCE_KEYS[keyof typeof PREFERENCE_KEYS]

/**
 * 記憶體版本，測試與無持久化需求的宿主使用
 */
export class MemoryPreferenceStore implements PreferenceStore {
    private readonly values = new Map<string, string>()

    constructor(initial: Record<string, string> = {}) {
        Object.entries(initial).forEach(([key, value]) => this.values.set(key, value))
    }

    get(key: string): string | null {
        return this.values.get(key) ?? null
    }

    set(key: string, value: string): void {
        this.values.set(key, value)
    }

    remove(key: string): void {
        this.values.delete(key)
    }
}

type PreferenceDefaults = Pick<DictationConfig, 'defaultModelId' | 'defaultHotkey' | 'maxRecordingDurationMs'>

/**
 * 聽寫偏好設定的型別化存取
 * 儲存的值無效時一律退回預設值
 */
export class DictationPreferences {
    constructor(
        private readonly store: PreferenceStore,
        private readonly defaults: PreferenceDefaults
    ) {}

    getSelectedModelId(): string {
        return this.store.get(PREFERENCE_KEYS.SELECTED_MODEL_ID) || this.defaults.defaultModelId
    }

    setSelectedModelId(modelId: string): void {
        this.store.set(PREFERENCE_KEYS.SELECTED_MODEL_ID, modelId)
    }

    getHotkey(): string {
        return this.store.get(PREFERENCE_KEYS.GLOBAL_HOTKEY) || this.defaults.defaultHotkey
    }

    setHotkey(combo: string): void {
        this.store.set(PREFERENCE_KEYS.GLOBAL_HOTKEY, combo)
    }

    // null 表示自動偵測語言
    getLanguage(): LanguageCode | null {
        const stored = this.store.get(PREFERENCE_KEYS.SELECTED_LANGUAGE)
        return stored && isValidLanguageCode(stored) ? stored : null
    }

    setLanguage(language: LanguageCode | null): void {
        if (language === null) {
            this.store.remove(PREFERENCE_KEYS.SELECTED_LANGUAGE)
        } else {
            this.store.set(PREFERENCE_KEYS.SELECTED_LANGUAGE, language)
        }
    }

    getMaxRecordingDurationMs(): number {
        const storedMs = Number(this.store.get(PREFERENCE_KEYS.MAX_RECORDING_DURATION)) * 1000
        return isTimerDelay(storedMs) ? storedMs : this.defaults.maxRecordingDurationMs
    }

    setMaxRecordingDurationSec(seconds: number): void {
        if (!Number.isFinite(seconds) || seconds <= 0) {
            throw new RangeError(`錄音時間上限必須為正數: ${seconds}`)
        }
        if (seconds * 1000 > MAX_TIMER_DELAY_MS) {
            throw new RangeError(`錄音時間上限超過 ${MAX_TIMER_DELAY_MS} ms: ${seconds}`)
        }
        this.store.set(PREFERENCE_KEYS.MAX_RECORDING_DURATION, String(seconds))
    }
}

function isTimerDelay(ms: number): boolean {
    return Number.isFinite(ms) && ms > 0 && ms <= MAX_TIMER_DELAY_MS
}
