import { err, Result } from '../types/result'
import type { DictationError, DictationErrorKind, HotkeyError } from '../types/dictation-error'

/**
 * 錯誤建構函數
 */
export const DictationErrors = {
    microphonePermissionDenied: (): DictationError => ({ kind: 'microphonePermissionDenied' }),
    accessibilityPermissionMissing: (): DictationError => ({ kind: 'accessibilityPermissionMissing' }),
    audioDeviceDisconnected: (): DictationError => ({ kind: 'audioDeviceDisconnected' }),
    modelNotFound: (modelId: string): DictationError => ({ kind: 'modelNotFound', modelId }),
    modelLoadingFailed: (modelId: string, reason: string): DictationError => ({ kind: 'modelLoadingFailed', modelId, reason }),
    noFocusedApplication: (): DictationError => ({ kind: 'noFocusedApplication' }),
    unsupportedApplication: (appName: string): DictationError => ({ kind: 'unsupportedApplication', appName }),
    injectionFailed: (reason: string): DictationError => ({ kind: 'injectionFailed', reason }),
    clipboardOperationFailed: (): DictationError => ({ kind: 'clipboardOperationFailed' }),
    networkUnavailable: (): DictationError => ({ kind: 'networkUnavailable' }),
    invalidAudioData: (): DictationError => ({ kind: 'invalidAudioData' }),
    lowConfidenceTranscription: (confidence: number): DictationError => ({ kind: 'lowConfidenceTranscription', confidence }),
    transcriptionFailed: (reason: string): DictationError => ({ kind: 'transcriptionFailed', reason }),
    unknown: (detail: string): DictationError => ({ kind: 'unknown', detail }),
} as const

const ERROR_KINDS: ReadonlySet<string> = new Set<DictationErrorKind>([
    'microphonePermissionDenied',
    'accessibilityPermissionMissing',
    'audioDeviceDisconnected',
    'modelNotFound',
    'modelLoadingFailed',
    'noFocusedApplication',
    'unsupportedApplication',
    'injectionFailed',
    'clipboardOperationFailed',
    'networkUnavailable',
    'invalidAudioData',
    'lowConfidenceTranscription',
    'transcriptionFailed',
    'unknown',
])

// 這些錯誤不中止流程，改為複製到剪貼簿
const NON_FATAL_INJECTION_KINDS: ReadonlySet<DictationErrorKind> = new Set<DictationErrorKind>([
    'noFocusedApplication',
    'unsupportedApplication',
    'accessibilityPermissionMissing',
])

export function isDictationError(value: unknown): value is DictationError {
    return typeof value === 'object'
        && value !== null
        && 'kind' in value
        && typeof value.kind === 'string'
        && ERROR_KINDS.has(value.kind)
}

export function isNonFatalInjectionError(error: DictationError): boolean {
    return NON_FATAL_INJECTION_KINDS.has(error.kind)
}

/**
 * 協作者違反約定拋出例外時，轉為 DictationError
 */
export function toDictationError(error: unknown): DictationError {
    if (isDictationError(error)) {
        return error
    }
    if (error instanceof DictationFailure) {
        return error.error
    }
    if (error instanceof Error) {
        return DictationErrors.unknown(error.message)
    }
    return DictationErrors.unknown(String(error))
}

/**
 * 人類可讀的錯誤描述
 */
export function describeDictationError(error: DictationError): string {
    switch (error.kind) {
        case 'microphonePermissionDenied':
            return 'Microphone access was denied. Please enable microphone permission in System Settings.'
        case 'accessibilityPermissionMissing':
            return 'Accessibility permission is required to insert text into other applications.'
        case 'audioDeviceDisconnected':
            return 'Audio device was disconnected. Please reconnect and try again.'
        case 'modelNotFound':
            return `Model '${error.modelId}' was not found. Please download it from settings.`
        case 'modelLoadingFailed':
            return `Failed to load '${error.modelId}' model: ${error.reason}`
        case 'noFocusedApplication':
            return 'No application is currently focused. Click on a text field and try again.'
        case 'unsupportedApplication':
            return `Text insertion is not supported in '${error.appName}'.`
        case 'injectionFailed':
            return `Failed to insert text: ${error.reason}`
        case 'clipboardOperationFailed':
            return 'Failed to copy text to the clipboard.'
        case 'networkUnavailable':
            return 'Network connection is not available. Please check your internet connection.'
        case 'invalidAudioData':
            return 'The recorded audio data is invalid or empty.'
        case 'lowConfidenceTranscription':
            return `Transcription confidence (${formatConfidence(error.confidence)}) is too low. Please speak clearly.`
        case 'transcriptionFailed':
            return `Transcription failed: ${error.reason}`
        case 'unknown':
            return `An unknown error occurred: ${error.detail}`
    }
}

export function describeHotkeyError(error: HotkeyError): string {
    switch (error.kind) {
        case 'invalidKeyCombo':
            return `Invalid key combination: ${error.combo}`
        case 'conflictingHotkey':
            return `Hotkey ${error.combo} conflicts with an existing shortcut`
        case 'accessibilityPermissionRequired':
            return 'Accessibility permission is required for global hotkeys'
        case 'systemError':
            return `System error: ${error.message}`
    }
}

/**
 * 復原建議，沒有建議時回傳 null
 */
export function getRecoverySuggestion(error: DictationError): string | null {
    switch (error.kind) {
        case 'microphonePermissionDenied':
            return 'Open System Settings > Privacy & Security > Microphone and enable access.'
        case 'accessibilityPermissionMissing':
            return 'Open System Settings > Privacy & Security > Accessibility and enable access.'
        case 'audioDeviceDisconnected':
            return 'Check that your microphone is connected, then try again.'
        case 'modelNotFound':
            return 'Download the model from the model settings, or select another model.'
        case 'modelLoadingFailed':
            return 'Try restarting the app or selecting a different model.'
        case 'noFocusedApplication':
            return 'Click in a text field before dictating.'
        case 'networkUnavailable':
            return 'Connect to the internet to download models.'
        default:
            return null
    }
}

/**
 * 包裝 DictationError 的例外，供需要 throw 的呼叫端使用
 */
export class DictationFailure extends Error {
    readonly error: DictationError

    constructor(error: DictationError) {
        super(describeDictationError(error))
        this.name = 'DictationFailure'
        this.error = error
    }
}

/**
 * 協作者若違約拋出例外，轉成 Result
 */
export async function settle<T>(operation: () => Promise<Result<T, DictationError>>): Promise<Result<T, DictationError>> {
    try {
        return await operation()
    } catch (error) {
        return err(toDictationError(error))
    }
}

function formatConfidence(confidence: number): string {
    return Number.isFinite(confidence) ? `${Math.round(confidence * 100)}%` : 'unknown'
}
