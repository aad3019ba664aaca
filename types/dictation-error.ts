/**
 * 聽寫錯誤分類
 *
 * 協作者以值回報錯誤，不跨邊界拋出例外
 */
export type DictationError =
    | { readonly kind: 'microphonePermissionDenied' }
    | { readonly kind: 'accessibilityPermissionMissing' }
    | { readonly kind: 'audioDeviceDisconnected' }
    | { readonly kind: 'modelNotFound'; readonly modelId: string }
    | { readonly kind: 'modelLoadingFailed'; readonly modelId: string; readonly reason: string }
    | { readonly kind: 'noFocusedApplication' }
    | { readonly kind: 'unsupportedApplication'; readonly appName: string }
    | { readonly kind: 'injectionFailed'; readonly reason: string }
    | { readonly kind: 'clipboardOperationFailed' }
    | { readonly kind: 'networkUnavailable' }
    | { readonly kind: 'invalidAudioData' }
    | { readonly kind: 'lowConfidenceTranscription'; readonly confidence: number }
    | { readonly kind: 'transcriptionFailed'; readonly reason: string }
    | { readonly kind: 'unknown'; readonly detail: string }

export type DictationErrorKind = DictationError['kind']

// 錯誤發生時正在進行的操作
export type DictationOperation = 'recording' | 'transcription' | 'textInjection' | 'modelLoading' | 'healthCheck'

export type PermissionKind = 'microphone' | 'accessibility'

// 快捷鍵註冊失敗原因
export type HotkeyError =
    | { readonly kind: 'invalidKeyCombo'; readonly combo: string }
    | { readonly kind: 'conflictingHotkey'; readonly combo: string }
    | { readonly kind: 'accessibilityPermissionRequired' }
    | { readonly kind: 'systemError'; readonly message: string }
