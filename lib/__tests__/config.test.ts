import { describe, test, expect } from 'vitest'
import { DEFAULT_DICTATION_CONFIG, getConfigInfo, loadDictationConfig, MAX_TIMER_DELAY_MS } from '../config'

describe('loadDictationConfig - 環境變數配置', () => {
    test('沒有環境變數時使用預設值', () => {
        expect(loadDictationConfig({})).toEqual(DEFAULT_DICTATION_CONFIG)
    })

    test('解析所有設定項目', () => {
        const config = loadDictationConfig({
            DICTATION_MAX_RECORDING_DURATION_SEC: '12.5',
            DICTATION_ERROR_RESET_DELAY_MS: '3000',
            DICTATION_SUCCESS_DISPLAY_MS: '1500',
            DICTATION_HEALTH_CHECK_INTERVAL_SEC: '10',
            DICTATION_DEFAULT_MODEL: ' openai_whisper-base ',
            DICTATION_HOTKEY: 'ctrl+alt+d',
            DICTATION_HOTKEY_MODE: 'toggle',
            DICTATION_AUDIO_BUFFER_SIZE: '2048',
            DICTATION_AUDIO_SAMPLE_RATE: '48000',
            DICTATION_DEBUG: 'TRUE'
        })

        expect(config).toEqual({
            ...DEFAULT_DICTATION_CONFIG,
            maxRecordingDurationMs: 12500,
            errorResetDelayMs: 3000,
            successDisplayMs: 1500,
            healthCheckIntervalMs: 10000,
            defaultModelId: 'openai_whisper-base',
            defaultHotkey: 'ctrl+alt+d',
            hotkeyMode: 'toggle',
            audio: { bufferSize: 2048, sampleRate: 48000 },
            enableDebugLogging: true
        })
    })

    test('無效的值退回預設值', () => {
        const config = loadDictationConfig({
            DICTATION_MAX_RECORDING_DURATION_SEC: '-5',
            DICTATION_ERROR_RESET_DELAY_MS: '2.5',
            DICTATION_HOTKEY_MODE: 'hold',
            DICTATION_AUDIO_BUFFER_SIZE: 'large',
            DICTATION_DEFAULT_MODEL: '   ',
            DICTATION_DEBUG: 'maybe'
        })

        expect(config.maxRecordingDurationMs).toBe(5000)
        expect(config.errorResetDelayMs).toBe(5000)
        expect(config.hotkeyMode).toBe('push-to-talk')
        expect(config.audio.bufferSize).toBe(1024)
        expect(config.defaultModelId).toBe('openai_whisper-tiny')
        expect(config.enableDebugLogging).toBe(false)
    })

    test('超過計時器最大延遲的時間設定退回預設值', () => {
        const config = loadDictationConfig({
            DICTATION_MAX_RECORDING_DURATION_SEC: '2147484',
            DICTATION_ERROR_RESET_DELAY_MS: '2147483648',
            DICTATION_SUCCESS_DISPLAY_MS: String(MAX_TIMER_DELAY_MS),
            DICTATION_HEALTH_CHECK_INTERVAL_SEC: '1e10'
        })

        expect(config.maxRecordingDurationMs).toBe(5000)
        expect(config.errorResetDelayMs).toBe(5000)
        expect(config.successDisplayMs).toBe(2147483647)
        expect(config.healthCheckIntervalMs).toBe(30000)
    })

    test('getConfigInfo', () => {
        expect(getConfigInfo(DEFAULT_DICTATION_CONFIG)).toBe(
            'Config: maxDuration=5000ms, model=openai_whisper-tiny, hotkey=cmd+shift+v (push-to-talk), buffer=1024'
        )
    })
})
