import { describeDictationError, getRecoverySuggestion } from './dictation-errors'
import { RecordingState, RecordingStates } from '../types/recording-state'
import type { DictationError, DictationOperation, PermissionKind } from '../types/dictation-error'

export const CLIPBOARD_FALLBACK_MESSAGE = 'Text copied to clipboard. Press Cmd+V to paste.'
export const INJECTION_FALLBACK_MESSAGE = 'Text injection failed. Text copied to clipboard instead.'

export type RecoveryAction =
    | { type: 'none' }
    | { type: 'showPermissionGuide'; permission: PermissionKind }
    | { type: 'watchAudioDevice' }
    | { type: 'fallbackModel'; modelId: string }
    | { type: 'reloadModel'; modelId: string }
    | { type: 'clipboardFallback' }

export interface RecoveryContext {
    operation: DictationOperation
    selectedModelId: string | null
    defaultModelId: string
    // 已計入本次錯誤的嘗試次數
    attempts: number
    maxAttempts: number
    // 有聽寫進行中，而此錯誤不屬於該工作階段（例如背景載入模型失敗）
    outsideActiveDictation: boolean
}

export interface RecoveryPlan {
    // null 表示維持目前狀態，只更新 errorMessage
    state: RecordingState | null
    errorMessage: string
    action: RecoveryAction
}

/**
 * 依錯誤種類決定下一個狀態、顯示訊息與復原動作
 */
export function planRecovery(error: DictationError, context: RecoveryContext): RecoveryPlan {
    const plan = planForError(error, context)
    return context.outsideActiveDictation ? { ...plan, state: null } : plan
}

function planForError(error: DictationError, context: RecoveryContext): RecoveryPlan {
    switch (error.kind) {
        case 'microphonePermissionDenied':
            return {
                state: RecordingStates.error('Microphone permission required'),
                errorMessage: 'Microphone permission is required to record audio',
                action: { type: 'showPermissionGuide', permission: 'microphone' },
            }

        case 'audioDeviceDisconnected':
            return {
                state: RecordingStates.error('Audio device disconnected'),
                errorMessage: 'Your audio device was disconnected. Please reconnect and try again.',
                action: { type: 'watchAudioDevice' },
            }

        case 'modelNotFound':
        case 'modelLoadingFailed':
            return planModelRecovery(error, context)

        case 'noFocusedApplication':
        case 'unsupportedApplication':
        case 'accessibilityPermissionMissing':
            return {
                state: RecordingStates.success(),
                errorMessage: CLIPBOARD_FALLBACK_MESSAGE,
                action: { type: 'clipboardFallback' },
            }

        case 'networkUnavailable':
            return {
                state: RecordingStates.error('Network unavailable'),
                errorMessage: 'Network is required for model downloads. Please check your connection.',
                action: { type: 'none' },
            }

        case 'unknown':
            return {
                state: RecordingStates.error(error.detail),
                errorMessage: describeDictationError(error),
                action: { type: 'none' },
            }

        default: {
            const description = describeDictationError(error)
            return {
                state: RecordingStates.error(description),
                errorMessage: getRecoverySuggestion(error) ?? description,
                action: { type: 'none' },
            }
        }
    }
}

function planModelRecovery(error: DictationError, context: RecoveryContext): RecoveryPlan {
    // 開始錄音時模型還沒載入：提示等待並在背景重新載入
    if (context.operation === 'recording') {
        const modelId = context.selectedModelId ?? context.defaultModelId
        return {
            state: RecordingStates.error('No model loaded'),
            errorMessage: 'Please wait for the AI model to load',
            action: { type: 'reloadModel', modelId },
        }
    }

    return {
        state: RecordingStates.error('Model loading failed'),
        errorMessage: describeDictationError(error),
        action: shouldFallbackToDefaultModel(context)
            ? { type: 'fallbackModel', modelId: context.defaultModelId }
            : { type: 'none' },
    }
}

export function shouldFallbackToDefaultModel(context: RecoveryContext): boolean {
    return context.selectedModelId !== context.defaultModelId && context.attempts < context.maxAttempts
}
