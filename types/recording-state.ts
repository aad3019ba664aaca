/**
 * 聽寫流程狀態
 *
 * 同一時間只存在一個值，只有 DictationOrchestrator 能寫入
 */
export type RecordingState =
    | { readonly kind: 'idle' }
    | { readonly kind: 'recording' }
    | { readonly kind: 'processing' }
    | { readonly kind: 'success' }
    | { readonly kind: 'error'; readonly message: string }

export type RecordingStateKind = RecordingState['kind']

export const RECORDING_STATE_KINDS: readonly RecordingStateKind[] = [
    'idle',
    'recording',
    'processing',
    'success',
    'error',
] as const

// 狀態建構函數
export const RecordingStates = {
    idle: (): RecordingState => ({ kind: 'idle' }),
    recording: (): RecordingState => ({ kind: 'recording' }),
    processing: (): RecordingState => ({ kind: 'processing' }),
    success: (): RecordingState => ({ kind: 'success' }),
    error: (message: string): RecordingState => ({ kind: 'error', message }),
} as const

export interface RecordingStateSummaryContext {
    isReady: boolean
    recordingProgress: number
}

/**
 * 給 UI 顯示的一行狀態摘要
 */
export function describeRecordingState(state: RecordingState, context: RecordingStateSummaryContext): string {
    switch (state.kind) {
        case 'idle':
            return context.isReady ? 'Ready to record' : 'Preparing...'
        case 'recording':
            return `Recording... (${Math.round(context.recordingProgress * 100)}%)`
        case 'processing':
            return 'Processing audio...'
        case 'success':
            return 'Transcription complete'
        case 'error':
            return `Error: ${state.message}`
    }
}
