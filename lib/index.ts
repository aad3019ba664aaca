/**
 * dictation-core 公開介面
 */

export * from './services'

export { StateMachine, isValidStateTransition } from './state-machine'
export { SerialExecutor } from './serial-executor'
export { TypedEmitter } from './typed-emitter'
export type { Listener } from './typed-emitter'
export { SignalChannel } from './signal-channel'
export type { Subscribable, Unsubscribe } from './signal-channel'
export { createServiceLogger, silentLogger } from './logger'
export type { ServiceLogger } from './logger'

export { CONFIDENCE_THRESHOLD, MAX_TIMER_DELAY_MS, DEFAULT_DICTATION_CONFIG, loadDictationConfig, getConfigInfo } from './config'
export type { AudioCaptureSettings, DictationConfig, HotkeyMode } from './config'
export { DictationPreferences, MemoryPreferenceStore, PREFERENCE_KEYS } from './preferences'
export type { PreferenceStore, PreferenceKey } from './preferences'
export { createDictationStore, dictationSelectors, initialDictationState } from './dictation-store'
export type { DictationStore, DictationStoreState, DictationStateKey, ReadonlyDictationStore } from './dictation-store'

export {
    DictationErrors,
    DictationFailure,
    describeDictationError,
    describeHotkeyError,
    getRecoverySuggestion,
    isDictationError,
    toDictationError
} from './dictation-errors'
export {
    planRecovery,
    shouldFallbackToDefaultModel,
    CLIPBOARD_FALLBACK_MESSAGE,
    INJECTION_FALLBACK_MESSAGE
} from './error-recovery-policy'
export type { RecoveryAction, RecoveryContext, RecoveryPlan } from './error-recovery-policy'
export { getLanguageLabel, getSupportedLanguages, isValidLanguageCode, normalizeLanguageCode } from './language-utils'

export { RecordingStates, describeRecordingState } from '../types/recording-state'
export type { RecordingState, RecordingStateKind } from '../types/recording-state'
export { STATE_TRANSITION_RULES } from '../types/state-transitions'
export type { StateTransitionResult, StateTransitionRule } from '../types/state-transitions'
export type { DictationError, DictationErrorKind, DictationOperation, HotkeyError, PermissionKind } from '../types/dictation-error'
export { ok, err } from '../types/result'
export type { Result } from '../types/result'
export { SUPPORTED_LANGUAGES } from '../types/language'
export type { LanguageCode, LanguageOption } from '../types/language'
