import type { Subscribable } from '../signal-channel'
import type { AudioCaptureSettings } from '../config'
import type { Result } from '../../types/result'
import type { DictationError, HotkeyError, PermissionKind } from '../../types/dictation-error'
import type { LanguageCode } from '../../types/language'

/**
 * 協作者介面定義
 *
 * DictationOrchestrator 只透過這些契約與平台功能互動，
 * 失敗一律以 Result 回報
 */

export type PermissionStatus = 'granted' | 'denied' | 'undetermined'

/**
 * 擷取到的音訊（單聲道 PCM）
 */
export interface CapturedAudio {
    samples: Float32Array
    sampleRate: number
}

/**
 * 音訊擷取端自己回報的狀態
 */
export type AudioCaptureStatus =
    | { kind: 'idle' }
    | { kind: 'recording' }
    | { kind: 'processing' }
    | { kind: 'error'; error: DictationError }

export interface AudioDeviceEvent {
    kind: 'connected' | 'disconnected'
    deviceName: string | null
}

/**
 * 音訊擷取服務介面
 */
export interface IAudioCaptureService {
    readonly isRecording: boolean

    /**
     * 擷取狀態序列
     */
    readonly statusChanges: Subscribable<AudioCaptureStatus>

    /**
     * 音量序列，0..1
     */
    readonly audioLevels: Subscribable<number>

    readonly deviceChanges: Subscribable<AudioDeviceEvent>

    currentDeviceName(): string | null

    startRecording(): Promise<Result<void, DictationError>>

    /**
     * 停止擷取並回傳緩衝區，沒有錄到內容時 samples 為空
     */
    stopRecording(): Promise<CapturedAudio>

    checkMicrophonePermission(): PermissionStatus

    requestMicrophonePermission(): Promise<boolean>
}

export interface TranscriptionResult {
    text: string
    confidence: number
}

/**
 * 語音轉錄服務介面
 */
export interface ITranscriptionService {
    readonly isModelLoaded: boolean

    loadModel(modelId: string): Promise<Result<void, DictationError>>

    /**
     * language 為 null 時由模型自動偵測
     */
    transcribe(audio: CapturedAudio, language: LanguageCode | null): Promise<Result<TranscriptionResult, DictationError>>
}

export interface InjectionSuccess {
    method: string
    fallbackUsed: boolean
}

/**
 * 文字輸入服務介面
 */
export interface ITextInjectionService {
    inject(text: string): Promise<Result<InjectionSuccess, DictationError>>
}

export interface PermissionSnapshot {
    microphone: PermissionStatus
    accessibility: PermissionStatus
}

/**
 * 系統權限服務介面
 */
export interface IPermissionService {
    readonly changes: Subscribable<PermissionSnapshot>

    hasAccessibilityPermission(): boolean

    /**
     * 引導使用者到系統設定開啟權限
     */
    showPermissionGuide(permission: PermissionKind): void
}

/**
 * 全域快捷鍵服務介面
 */
export interface IHotkeyService {
    registerPushToTalk(
        identifier: string,
        combo: string,
        onPress: () => void,
        onRelease: () => void
    ): Result<void, HotkeyError>

    unregister(identifier: string): void
}

/**
 * 模型管理服務介面（下載由外部負責）
 */
export interface IModelManager {
    isModelDownloaded(modelId: string): boolean

    readonly installedModelsChanged: Subscribable<readonly string[]>
}

/**
 * 剪貼簿服務介面
 */
export interface IClipboardService {
    writeText(text: string): Promise<Result<void, DictationError>>
}

export type AudioCaptureFactory = (settings: AudioCaptureSettings) => IAudioCaptureService

/**
 * 服務鍵值常數
 */
export const SERVICE_KEYS = {
    AUDIO_CAPTURE: 'AudioCaptureService',
    TRANSCRIPTION: 'TranscriptionService',
    TEXT_INJECTION: 'TextInjectionService',
    PERMISSIONS: 'PermissionService',
    HOTKEYS: 'HotkeyService',
    MODEL_MANAGER: 'ModelManager',
    CLIPBOARD: 'ClipboardService',
} as const

export type ServiceKey = typeof SERVICE_KEYS[keyof typeof SERVICE_KEYS]

/**
 * 服務類型映射，提供編譯時類型檢查
 */
export interface DictationServiceMap {
    [SERVICE_KEYS.AUDIO_CAPTURE]: IAudioCaptureService
    [SERVICE_KEYS.TRANSCRIPTION]: ITranscriptionService
    [SERVICE_KEYS.TEXT_INJECTION]: ITextInjectionService
    [SERVICE_KEYS.PERMISSIONS]: IPermissionService
    [SERVICE_KEYS.HOTKEYS]: IHotkeyService
    [SERVICE_KEYS.MODEL_MANAGER]: IModelManager
    [SERVICE_KEYS.CLIPBOARD]: IClipboardService
}

/**
 * 組裝端提供的協作者工廠
 */
export interface DictationProviders {
    audioCapture: AudioCaptureFactory
    transcription: () => ITranscriptionService
    textInjection: () => ITextInjectionService
    permissions: () => IPermissionService
    hotkeys: () => IHotkeyService
    modelManager: () => IModelManager
    clipboard: () => IClipboardService
}
