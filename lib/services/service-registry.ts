import { ServiceContainer } from './service-container'
import { DictationOrchestrator } from './dictation-orchestrator'
import { SERVICE_KEYS, DictationProviders, DictationServiceMap } from './interfaces'
import { DictationConfig, loadDictationConfig } from '../config'
import { createServiceLogger, ServiceLogger } from '../logger'
import { DictationPreferences, MemoryPreferenceStore, PreferenceStore } from '../preferences'
import { createDictationStore } from '../dictation-store'

export interface DictationRuntimeOptions {
    providers: DictationProviders
    preferenceStore?: PreferenceStore
    config?: DictationConfig
    logger?: ServiceLogger
}

export interface DictationRuntime {
    orchestrator: DictationOrchestrator
    container: ServiceContainer<DictationServiceMap>
    preferences: DictationPreferences
    start(): Promise<void>
    stop(): Promise<void>
}

/**
 * 服務註冊：把宿主提供的協作者工廠註冊進新的容器，並組出協調服務
 */
export function createDictationRuntime(options: DictationRuntimeOptions): DictationRuntime {
    const config = options.config ?? loadDictationConfig()
    const logger = options.logger ?? createServiceLogger(config.enableDebugLogging)
    const { providers } = options

    const container = new ServiceContainer<DictationServiceMap>(logger)
    const preferences = new DictationPreferences(options.preferenceStore ?? new MemoryPreferenceStore(), config)

    // 音訊擷取依目前設定建立，設定變更時由 orchestrator 觸發重建
    container.registerSingleton(SERVICE_KEYS.AUDIO_CAPTURE, () =>
        providers.audioCapture(orchestrator.getAudioCaptureSettings())
    )
    container.registerSingleton(SERVICE_KEYS.TRANSCRIPTION, providers.transcription)
    container.registerSingleton(SERVICE_KEYS.TEXT_INJECTION, providers.textInjection)
    container.registerSingleton(SERVICE_KEYS.PERMISSIONS, providers.permissions)
    container.registerSingleton(SERVICE_KEYS.HOTKEYS, providers.hotkeys)
    container.registerSingleton(SERVICE_KEYS.MODEL_MANAGER, providers.modelManager)
    container.registerSingleton(SERVICE_KEYS.CLIPBOARD, providers.clipboard)

    const orchestrator = new DictationOrchestrator({
        container,
        preferences,
        config,
        store: createDictationStore({ selectedModelId: preferences.getSelectedModelId() }),
        logger
    })

    logger.log(`✅ [ServiceRegistry] 已註冊 ${container.getRegisteredServices().length} 個協作者`)

    return {
        orchestrator,
        container,
        preferences,
        async start() {
            await container.initializeServices()
            await orchestrator.start()
        },
        async stop() {
            await orchestrator.stop()
            await container.cleanupServices()
        }
    }
}
