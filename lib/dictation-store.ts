import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import { RecordingState, RecordingStates } from '../types/recording-state'

/**
 * 對外可觀察的聽寫狀態
 */
export interface DictationStoreState {
  // 流程狀態
  recordingState: RecordingState
  errorMessage: string | null
  lastTranscription: string

  // 錄音狀態
  audioLevel: number
  recordingProgress: number
  currentAudioDevice: string | null

  // 就緒與權限
  isReady: boolean
  hasMicrophonePermission: boolean
  hasAccessibilityPermission: boolean

  // 模型載入
  selectedModelId: string | null
  isLoadingModel: boolean
  modelLoadingProgress: number
  modelLoadingStatus: string | null
}

export type DictationStateKey = keyof DictationStoreState

export const initialDictationState: DictationStoreState = {
  recordingState: RecordingStates.idle(),
  errorMessage: null,
  lastTranscription: '',

  audioLevel: 0,
  recordingProgress: 0,
  currentAudioDevice: null,

  isReady: false,
  hasMicrophonePermission: false,
  hasAccessibilityPermission: false,

  selectedModelId: null,
  isLoadingModel: false,
  modelLoadingProgress: 0,
  modelLoadingStatus: null,
}

/**
 * 建立 store，只有 DictationOrchestrator 持有可寫入的參考
 */
export function createDictationStore(initial: Partial<DictationStoreState> = {}) {
  return createStore<DictationStoreState>()(
    subscribeWithSelector(() => ({ ...initialDictationState, ...initial }))
  )
}

export type DictationStore = ReturnType<typeof createDictationStore>

/**
 * 給 UI 的唯讀介面
 */
export type ReadonlyDictationStore = Pick<DictationStore, 'getState' | 'subscribe'>

// Selector 函數
export const dictationSelectors = {
  isBusy: (state: DictationStoreState) =>
    state.recordingState.kind === 'recording' || state.recordingState.kind === 'processing',
  canStart: (state: DictationStoreState) =>
    state.recordingState.kind === 'idle' || state.recordingState.kind === 'success' || state.recordingState.kind === 'error',
  errorText: (state: DictationStoreState) =>
    state.recordingState.kind === 'error' ? state.recordingState.message : state.errorMessage,
}
