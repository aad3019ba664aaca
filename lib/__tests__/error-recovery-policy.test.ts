import { describe, test, expect } from 'vitest'
import {
    planRecovery,
    shouldFallbackToDefaultModel,
    RecoveryContext,
    CLIPBOARD_FALLBACK_MESSAGE
} from '../error-recovery-policy'
import { DictationErrors } from '../dictation-errors'

const context = (overrides: Partial<RecoveryContext> = {}): RecoveryContext => ({
    operation: 'transcription',
    selectedModelId: 'openai_whisper-base',
    defaultModelId: 'openai_whisper-tiny',
    attempts: 1,
    maxAttempts: 3,
    outsideActiveDictation: false,
    ...overrides
})

describe('planRecovery - 錯誤復原策略', () => {
    test('麥克風權限被拒：顯示權限引導', () => {
        expect(planRecovery(DictationErrors.microphonePermissionDenied(), context({ operation: 'recording' }))).toEqual({
            state: { kind: 'error', message: 'Microphone permission required' },
            errorMessage: 'Microphone permission is required to record audio',
            action: { type: 'showPermissionGuide', permission: 'microphone' }
        })
    })

    test('音訊裝置斷線：等待重新連線', () => {
        const plan = planRecovery(DictationErrors.audioDeviceDisconnected(), context({ operation: 'recording' }))

        expect(plan.state).toEqual({ kind: 'error', message: 'Audio device disconnected' })
        expect(plan.action).toEqual({ type: 'watchAudioDevice' })
    })

    test('錄音時模型未載入：提示等待並重新載入目前模型', () => {
        const plan = planRecovery(DictationErrors.modelNotFound('openai_whisper-base'), context({ operation: 'recording' }))

        expect(plan).toEqual({
            state: { kind: 'error', message: 'No model loaded' },
            errorMessage: 'Please wait for the AI model to load',
            action: { type: 'reloadModel', modelId: 'openai_whisper-base' }
        })
    })

    test('尚未選擇模型時重新載入預設模型', () => {
        const plan = planRecovery(
            DictationErrors.modelNotFound('openai_whisper-base'),
            context({ operation: 'recording', selectedModelId: null })
        )

        expect(plan.action).toEqual({ type: 'reloadModel', modelId: 'openai_whisper-tiny' })
    })

    test('模型載入失敗：退回預設模型', () => {
        const plan = planRecovery(
            DictationErrors.modelLoadingFailed('openai_whisper-base', 'corrupted weights'),
            context({ operation: 'modelLoading' })
        )

        expect(plan).toEqual({
            state: { kind: 'error', message: 'Model loading failed' },
            errorMessage: "Failed to load 'openai_whisper-base' model: corrupted weights",
            action: { type: 'fallbackModel', modelId: 'openai_whisper-tiny' }
        })
    })

    test('達到嘗試上限後不再退回', () => {
        const plan = planRecovery(
            DictationErrors.modelLoadingFailed('openai_whisper-base', 'corrupted weights'),
            context({ operation: 'modelLoading', attempts: 3 })
        )

        expect(plan.action).toEqual({ type: 'none' })
    })

    test('預設模型本身失敗時不退回', () => {
        const plan = planRecovery(
            DictationErrors.modelLoadingFailed('openai_whisper-tiny', 'corrupted weights'),
            context({ operation: 'modelLoading', selectedModelId: 'openai_whisper-tiny' })
        )

        expect(plan.action).toEqual({ type: 'none' })
    })

    test.each([
        DictationErrors.noFocusedApplication(),
        DictationErrors.unsupportedApplication('Terminal'),
        DictationErrors.accessibilityPermissionMissing()
    ])('$kind 不中止流程，改用剪貼簿', error => {
        expect(planRecovery(error, context({ operation: 'textInjection' }))).toEqual({
            state: { kind: 'success' },
            errorMessage: CLIPBOARD_FALLBACK_MESSAGE,
            action: { type: 'clipboardFallback' }
        })
    })

    test('其他輸入錯誤進入 error', () => {
        const plan = planRecovery(DictationErrors.injectionFailed('event tap disabled'), context({ operation: 'textInjection' }))

        expect(plan.state).toEqual({ kind: 'error', message: 'Failed to insert text: event tap disabled' })
        expect(plan.errorMessage).toBe('Failed to insert text: event tap disabled')
        expect(plan.action).toEqual({ type: 'none' })
    })

    test('聽寫進行中時背景模型錯誤不改變狀態，只更新訊息', () => {
        const plan = planRecovery(
            DictationErrors.modelLoadingFailed('openai_whisper-base', 'corrupted weights'),
            context({ operation: 'modelLoading', outsideActiveDictation: true })
        )

        expect(plan).toEqual({
            state: null,
            errorMessage: "Failed to load 'openai_whisper-base' model: corrupted weights",
            action: { type: 'fallbackModel', modelId: 'openai_whisper-tiny' }
        })
    })

    test('網路無法使用', () => {
        const plan = planRecovery(DictationErrors.networkUnavailable(), context({ operation: 'modelLoading' }))

        expect(plan.state).toEqual({ kind: 'error', message: 'Network unavailable' })
        expect(plan.errorMessage).toBe('Network is required for model downloads. Please check your connection.')
    })

    test('未知錯誤以原始描述作為狀態訊息', () => {
        const plan = planRecovery(DictationErrors.unknown('Input device busy'), context())

        expect(plan.state).toEqual({ kind: 'error', message: 'Input device busy' })
        expect(plan.errorMessage).toBe('An unknown error occurred: Input device busy')
    })
})

describe('shouldFallbackToDefaultModel', () => {
    test('只有選擇的不是預設模型且未達上限時才退回', () => {
        expect(shouldFallbackToDefaultModel(context({ attempts: 2 }))).toBe(true)
        expect(shouldFallbackToDefaultModel(context({ attempts: 3 }))).toBe(false)
        expect(shouldFallbackToDefaultModel(context({ selectedModelId: 'openai_whisper-tiny' }))).toBe(false)
        expect(shouldFallbackToDefaultModel(context({ selectedModelId: null }))).toBe(true)
    })
})
