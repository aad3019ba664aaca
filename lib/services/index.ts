/**
 * 服務層統一入口
 */

export { BaseService, ServiceError } from './base-service'
export type { ServiceStatus } from './base-service'

export { ServiceContainer, ServiceContainerError } from './service-container'
export type {
    ServiceContainerStatus,
    ServiceInitializationResult,
    ServiceCleanupResult
} from './service-container'

export {
    DictationOrchestrator,
    PUSH_TO_TALK_HOTKEY_ID,
    MODEL_CHANGE_REFUSED_MESSAGE,
    DEVICE_RECONNECTED_MESSAGE
} from './dictation-orchestrator'
export type {
    DictationEvents,
    DictationOrchestratorOptions,
    DictationOrchestratorStatus,
    DictationSessionSnapshot
} from './dictation-orchestrator'

export { InjectionDispatcher } from './injection-dispatcher'
export type { InjectionOutcome } from './injection-dispatcher'

export { TextInjectionChain } from './text-injection-chain'
export type { ApplicationContext, TextInjectionStrategy, TextInjectionChainOptions } from './text-injection-chain'

export { createDictationRuntime } from './service-registry'
export type { DictationRuntime, DictationRuntimeOptions } from './service-registry'

export { SERVICE_KEYS } from './interfaces'
export type {
    AudioCaptureFactory,
    AudioCaptureStatus,
    AudioDeviceEvent,
    CapturedAudio,
    DictationProviders,
    DictationServiceMap,
    IAudioCaptureService,
    IClipboardService,
    IHotkeyService,
    IModelManager,
    IPermissionService,
    ITextInjectionService,
    ITranscriptionService,
    InjectionSuccess,
    PermissionSnapshot,
    PermissionStatus,
    ServiceKey,
    TranscriptionResult
} from './interfaces'
