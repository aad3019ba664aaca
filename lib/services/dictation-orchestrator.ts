import { BaseService, ServiceStatus } from './base-service'
import { ServiceContainer } from './service-container'
import { InjectionDispatcher, InjectionOutcome } from './injection-dispatcher'
import {
    SERVICE_KEYS,
    AudioCaptureStatus,
    AudioDeviceEvent,
    CapturedAudio,
    DictationServiceMap,
    IAudioCaptureService,
    IClipboardService,
    IHotkeyService,
    IModelManager,
    IPermissionService,
    ITextInjectionService,
    ITranscriptionService
} from './interfaces'
import { StateMachine } from '../state-machine'
import { SerialExecutor } from '../serial-executor'
import { TypedEmitter } from '../typed-emitter'
import { createServiceLogger, ServiceLogger } from '../logger'
import { AudioCaptureSettings, CONFIDENCE_THRESHOLD, DEFAULT_DICTATION_CONFIG, DictationConfig } from '../config'
import { DictationPreferences } from '../preferences'
import {
    createDictationStore,
    dictationSelectors,
    DictationStateKey,
    DictationStore,
    DictationStoreState,
    ReadonlyDictationStore
} from '../dictation-store'
import {
    DictationErrors,
    describeDictationError,
    describeHotkeyError,
    settle,
    toDictationError
} from '../dictation-errors'
import { planRecovery, RecoveryAction, RecoveryPlan } from '../error-recovery-policy'
import type { Unsubscribe } from '../signal-channel'
import { describeRecordingState, RecordingState, RecordingStateKind, RecordingStates } from '../../types/recording-state'
import type { DictationError, DictationOperation } from '../../types/dictation-error'
import { err, ok, Result } from '../../types/result'
import { formatDurationMs } from '../../utils/time'

export const PUSH_TO_TALK_HOTKEY_ID = 'dictation.push_to_talk'

export const MODEL_CHANGE_REFUSED_MESSAGE = 'Cannot change model while recording or processing'
export const DEVICE_RECONNECTED_MESSAGE = 'Audio device reconnected. Ready to record.'

/**
 * 生命週期事件
 */
export type DictationEvents = {
    stateChanged: { from: RecordingState; to: RecordingState }
    transcribed: { text: string; confidence: number }
    injected: InjectionOutcome
    recovery: { error: DictationError; operation: DictationOperation; action: RecoveryAction }
}

/**
 * 一次聽寫的暫存資料，進入 recording 時建立，回到 idle 時清除
 */
interface DictationSession {
    readonly id: number
    startedAt: number | null
    elapsedMs: number
    captureStarted: boolean
    transcript: string | null
}

export interface DictationSessionSnapshot {
    id: number
    startedAt: number | null
    elapsedMs: number
    captureStarted: boolean
    transcript: string | null
    recoveryAttempts: number
}

export interface DictationOrchestratorStatus extends ServiceStatus {
    recordingState: RecordingStateKind
    hotkeyRegistered: boolean
    modelLoaded: boolean
    lastHealthCheck: string | null
}

export interface DictationOrchestratorOptions {
    container: ServiceContainer<DictationServiceMap>
    preferences: DictationPreferences
    config?: DictationConfig
    store?: DictationStore
    logger?: ServiceLogger
}

type ModelLoadOrigin = 'user' | 'startup' | 'recovery' | 'healthCheck'

/**
 * DictationOrchestrator - 聽寫流程協調服務
 *
 * 依序協調音訊擷取 → 轉錄 → 文字輸入，並在任一步失敗時套用復原策略。
 * 所有狀態轉換都在同一個 SerialExecutor 中執行；耗時工作在佇列外進行，
 * 完成後再回到佇列套用結果，並確認工作階段沒有被較新的轉換取代。
 */
export class DictationOrchestrator extends BaseService {
    protected readonly serviceName = 'DictationOrchestrator'

    readonly events = new TypedEmitter<DictationEvents>()

    private readonly container: ServiceContainer<DictationServiceMap>
    private readonly preferences: DictationPreferences
    private readonly config: DictationConfig
    private readonly stateStore: DictationStore
    private readonly machine: StateMachine
    private readonly executor = new SerialExecutor()
    private readonly modelLoads = new SerialExecutor()
    private readonly dispatcher: InjectionDispatcher

    private audioSettings: AudioCaptureSettings
    private session: DictationSession | null = null
    private sessionCounter = 0
    private errorRecoveryAttempts = 0

    private autoStopTimer: NodeJS.Timeout | null = null
    private progressTimer: NodeJS.Timeout | null = null
    private revertTimer: NodeJS.Timeout | null = null
    private healthCheckTimer: NodeJS.Timeout | null = null

    private audioSubscriptions: Unsubscribe[] = []
    private platformSubscriptions: Unsubscribe[] = []
    private watchingAudioDevice = false
    private hotkeyRegistered = false
    private lastHealthCheck: number | null = null
    private readonly modelLoadsInFlight = new Set<Promise<boolean>>()

    constructor(options: DictationOrchestratorOptions) {
        const config = options.config ?? DEFAULT_DICTATION_CONFIG
        super(options.logger ?? createServiceLogger(config.enableDebugLogging))

        this.container = options.container
        this.preferences = options.preferences
        this.config = config
        this.audioSettings = { ...config.audio }
        this.stateStore = options.store ?? createDictationStore()
        this.machine = new StateMachine(this.logger)
        this.dispatcher = new InjectionDispatcher(
            () => this.textInjection,
            () => this.clipboard,
            this.logger
        )
    }

    // ===== 協作者（每次從容器解析，重建後自動取得新實例） =====

    private get audioCapture(): IAudioCaptureService {
        return this.container.resolve(SERVICE_KEYS.AUDIO_CAPTURE)
    }

    private get transcription(): ITranscriptionService {
        return this.container.resolve(SERVICE_KEYS.TRANSCRIPTION)
    }

    private get textInjection(): ITextInjectionService {
        return this.container.resolve(SERVICE_KEYS.TEXT_INJECTION)
    }

    private get permissions(): IPermissionService {
        return this.container.resolve(SERVICE_KEYS.PERMISSIONS)
    }

    private get hotkeys(): IHotkeyService {
        return this.container.resolve(SERVICE_KEYS.HOTKEYS)
    }

    private get modelManager(): IModelManager {
        return this.container.resolve(SERVICE_KEYS.MODEL_MANAGER)
    }

    private get clipboard(): IClipboardService {
        return this.container.resolve(SERVICE_KEYS.CLIPBOARD)
    }

    // ===== 生命週期 =====

    async initialize(): Promise<void> {
        this.logInfo('初始化聽寫流程')

        try {
            this.bindAudioCapture()
            this.bindPlatformSignals()
        } catch (error) {
            this.handleError('綁定協作者', error)
        }

        this.stateStore.setState({
            selectedModelId: this.preferences.getSelectedModelId(),
            currentAudioDevice: this.audioCapture.currentDeviceName()
        })
        this.checkAllPermissions()

        await this.loadModel(this.preferences.getSelectedModelId(), 'startup')

        this.registerHotkey()
        this.startHealthMonitoring()
        this.updateReadyState()
    }

    async cleanup(): Promise<void> {
        this.stopHealthMonitoring()
        this.clearRecordingTimers()
        this.clearRevertTimer()

        // 先解除訂閱，釋放擷取時的 idle 通知不再觸發轉錄
        this.unbindAudioCapture()
        if (this.session?.captureStarted && this.audioCapture.isRecording) {
            await this.releaseCapture()
        }

        if (this.hotkeyRegistered) {
            this.hotkeys.unregister(PUSH_TO_TALK_HOTKEY_ID)
            this.hotkeyRegistered = false
        }

        this.platformSubscriptions.forEach(unsubscribe => unsubscribe())
        this.platformSubscriptions = []
        this.watchingAudioDevice = false

        await this.executor.run(() => {
            this.machine.reset()
            this.session = null
            this.stateStore.setState({
                recordingState: RecordingStates.idle(),
                audioLevel: 0,
                recordingProgress: 0
            })
        })
    }

    // ===== 對外查詢 =====

    getStore(): ReadonlyDictationStore {
        return this.stateStore
    }

    getState(): Readonly<DictationStoreState> {
        return this.stateStore.getState()
    }

    getRecordingState(): RecordingState {
        return this.machine.getCurrentState()
    }

    /**
     * 訂閱單一欄位的變化
     */
    observe<K extends DictationStateKey>(
        key: K,
        listener: (value: DictationStoreState[K], previous: DictationStoreState[K]) => void
    ): Unsubscribe {
        return this.stateStore.subscribe(state => state[key], listener)
    }

    getStateSummary(): string {
        const state = this.stateStore.getState()
        return describeRecordingState(state.recordingState, state)
    }

    getAvailableTransitions(): RecordingStateKind[] {
        return this.machine.getAvailableTransitions()
    }

    getSessionSnapshot(): DictationSessionSnapshot | null {
        const session = this.session
        if (!session) {
            return null
        }

        const live = this.machine.getCurrentState().kind === 'recording' && session.startedAt !== null
        return {
            id: session.id,
            startedAt: session.startedAt,
            elapsedMs: live && session.startedAt !== null ? Date.now() - session.startedAt : session.elapsedMs,
            captureStarted: session.captureStarted,
            transcript: session.transcript,
            recoveryAttempts: this.errorRecoveryAttempts
        }
    }

    getAudioCaptureSettings(): AudioCaptureSettings {
        return { ...this.audioSettings }
    }

    getStatus(): DictationOrchestratorStatus {
        return {
            ...super.getStatus(),
            recordingState: this.machine.getCurrentState().kind,
            hotkeyRegistered: this.hotkeyRegistered,
            modelLoaded: this.isRunning ? this.transcription.isModelLoaded : false,
            lastHealthCheck: this.lastHealthCheck === null ? null : new Date(this.lastHealthCheck).toISOString()
        }
    }

    /**
     * 等待所有進行中的模型載入（含背景重新載入）結束
     */
    async whenModelLoadSettled(): Promise<void> {
        while (this.modelLoadsInFlight.size > 0) {
            await Promise.all(this.modelLoadsInFlight)
        }
    }

    // ===== 聽寫流程 =====

    /**
     * 開始錄音
     * 只在 idle / success / error 時有效，其餘狀態直接回傳 false
     */
    async startDictation(): Promise<boolean> {
        const session = await this.executor.run(() => this.beginSession())
        if (!session) {
            this.logWarning(`目前狀態 ${this.machine.getCurrentState().kind}，無法開始錄音`)
            return false
        }

        const permitted = await this.ensureMicrophonePermission()
        if (!permitted) {
            await this.recoverFromError(DictationErrors.microphonePermissionDenied(), 'recording', session)
            return false
        }

        if (!(await this.isActiveRecording(session))) {
            this.logInfo('錄音在權限檢查期間被取消')
            return false
        }

        // 模型切換中不開始錄音，避免載入結果落在進行中的聽寫上
        if (!this.transcription.isModelLoaded || this.stateStore.getState().isLoadingModel) {
            const modelId = this.preferences.getSelectedModelId()
            await this.recoverFromError(DictationErrors.modelNotFound(modelId), 'recording', session)
            return false
        }

        const started = await settle(() => this.audioCapture.startRecording())
        if (!started.ok) {
            await this.recoverFromError(started.error, 'recording', session)
            return false
        }

        const live = await this.executor.run(() => this.markCaptureStarted(session))
        if (!live) {
            this.logInfo('錄音啟動完成前已被取代，釋放音訊擷取')
            await this.releaseCapture()
            return false
        }

        this.logSuccess('開始錄音', { sessionId: session.id })
        return true
    }

    /**
     * 停止錄音並轉錄、輸出文字
     * 只在 recording 時有效；擷取尚未真正開始時視為取消
     */
    async stopDictation(): Promise<boolean> {
        const session = await this.executor.run(() => this.beginProcessing())
        if (!session) {
            return false
        }

        let audio: CapturedAudio
        try {
            audio = await this.audioCapture.stopRecording()
        } catch (error) {
            await this.recoverFromError(toDictationError(error), 'recording', session)
            return false
        }
        this.logInfo(`錄音結束，長度 ${formatDurationMs(session.elapsedMs)}`)

        if (audio.samples.length === 0) {
            await this.recoverFromError(DictationErrors.invalidAudioData(), 'transcription', session)
            return false
        }

        const transcribed = await settle(() => this.transcription.transcribe(audio, this.preferences.getLanguage()))
        if (!transcribed.ok) {
            await this.recoverFromError(transcribed.error, 'transcription', session)
            return false
        }

        const { text, confidence } = transcribed.value
        if (!(confidence >= CONFIDENCE_THRESHOLD)) {
            await this.recoverFromError(DictationErrors.lowConfidenceTranscription(confidence), 'transcription', session)
            return false
        }

        const stored = await this.executor.run(() => {
            if (this.session !== session) {
                return false
            }
            session.transcript = text
            this.stateStore.setState({ lastTranscription: text })
            return true
        })
        if (!stored) {
            return false
        }
        this.events.emit('transcribed', { text, confidence })

        const outcome = await this.dispatcher.dispatch(text)
        return this.completeInjection(outcome, session)
    }

    // ===== 快捷鍵 =====

    async handleHotkeyPress(): Promise<void> {
        const kind = await this.executor.run(() => this.machine.getCurrentState().kind)

        switch (kind) {
            case 'idle':
            case 'success':
            case 'error':
                await this.startDictation()
                return
            case 'recording':
                if (this.config.hotkeyMode === 'toggle') {
                    await this.stopDictation()
                }
                return
            case 'processing':
                this.logInfo('轉錄中，忽略快捷鍵')
                return
        }
    }

    async handleHotkeyRelease(): Promise<void> {
        if (this.config.hotkeyMode !== 'push-to-talk') {
            return
        }

        const kind = await this.executor.run(() => this.machine.getCurrentState().kind)
        if (kind === 'recording') {
            await this.stopDictation()
            return
        }
        this.logInfo(`狀態 ${kind}，忽略放開快捷鍵`)
    }

    /**
     * 更換快捷鍵組合並重新註冊
     */
    updateHotkey(combo: string): boolean {
        if (this.hotkeyRegistered) {
            this.hotkeys.unregister(PUSH_TO_TALK_HOTKEY_ID)
            this.hotkeyRegistered = false
        }
        this.preferences.setHotkey(combo)
        return this.registerHotkey()
    }

    // ===== 模型 =====

    async changeModel(modelId: string): Promise<boolean> {
        if (!(await this.ensureIdleForModelChange())) {
            return false
        }
        return this.loadModel(modelId, 'user')
    }

    async loadSelectedModel(): Promise<boolean> {
        if (!(await this.ensureIdleForModelChange())) {
            return false
        }
        return this.loadModel(this.preferences.getSelectedModelId(), 'user')
    }

    // ===== 權限 =====

    async requestPermissions(): Promise<boolean> {
        const audio = this.audioCapture
        if (audio.checkMicrophonePermission() !== 'granted') {
            try {
                await audio.requestMicrophonePermission()
            } catch (error) {
                this.logger.error(`❌ [${this.serviceName}] 請求麥克風權限失敗:`, error)
            }
        }
        return this.checkAllPermissions()
    }

    // ===== 音訊設定 =====

    /**
     * 更新擷取設定並重建音訊擷取服務，只在 idle 時允許
     */
    async reconfigureAudioCapture(settings: Partial<AudioCaptureSettings>): Promise<boolean> {
        return this.executor.run(async () => {
            if (this.machine.getCurrentState().kind !== 'idle') {
                this.logWarning('錄音或轉錄中，無法變更音訊設定')
                return false
            }

            this.audioSettings = { ...this.audioSettings, ...settings }
            this.unbindAudioCapture()
            await this.container.rebuild(SERVICE_KEYS.AUDIO_CAPTURE)
            this.bindAudioCapture()

            this.stateStore.setState({ currentAudioDevice: this.audioCapture.currentDeviceName() })
            this.checkAllPermissions()
            this.logSuccess('更新音訊設定', this.audioSettings)
            return true
        })
    }

    // ===== 健康檢查 =====

    /**
     * 比對流程狀態與協作者實際狀態，修正不一致
     */
    async checkComponentHealth(): Promise<void> {
        this.lastHealthCheck = Date.now()

        const { kind, session } = await this.executor.run(() => ({
            kind: this.machine.getCurrentState().kind,
            session: this.session
        }))
        const audio = this.audioCapture

        if (audio.isRecording && kind !== 'recording' && kind !== 'processing') {
            this.logWarning('音訊擷取仍在進行但流程不在錄音中，強制停止')
            await this.releaseCapture()
        } else if (kind === 'recording' && session?.captureStarted && !audio.isRecording) {
            this.logWarning('音訊擷取已中斷，直接轉錄目前內容')
            await this.stopDictation()
        }

        if (!this.transcription.isModelLoaded && this.stateStore.getState().isReady) {
            this.logWarning('模型已被卸載，重新載入')
            this.stateStore.setState({ isReady: false })
            await this.loadModel(this.preferences.getSelectedModelId(), 'healthCheck')
        }

        this.checkAllPermissions()
    }

    // ===== 內部：狀態轉換（只能在 executor 中呼叫） =====

    private applyTransition(target: RecordingState): boolean {
        const result = this.machine.transition(target)
        if (!result.success) {
            return false
        }

        const from = result.previousState
        this.clearRevertTimer()

        if (from.kind === 'recording') {
            this.clearRecordingTimers()
            this.stateStore.setState({ audioLevel: 0 })
        }
        if (target.kind === 'idle') {
            this.session = null
        }

        this.stateStore.setState({ recordingState: target })

        if (target.kind === 'error') {
            this.scheduleRevertToIdle(this.config.errorResetDelayMs)
        } else if (target.kind === 'success') {
            this.scheduleRevertToIdle(this.config.successDisplayMs)
        }

        this.events.emit('stateChanged', { from, to: target })
        return true
    }

    private beginSession(): DictationSession | null {
        if (!this.machine.canTransition('recording')) {
            return null
        }

        const session: DictationSession = {
            id: ++this.sessionCounter,
            startedAt: null,
            elapsedMs: 0,
            captureStarted: false,
            transcript: null
        }
        this.session = session
        this.errorRecoveryAttempts = 0
        this.stateStore.setState({ errorMessage: null, recordingProgress: 0, audioLevel: 0 })
        this.applyTransition(RecordingStates.recording())
        return session
    }

    private markCaptureStarted(session: DictationSession): boolean {
        if (this.session !== session || this.machine.getCurrentState().kind !== 'recording') {
            return false
        }
        session.captureStarted = true
        session.startedAt = Date.now()
        this.startRecordingTimers(session)
        return true
    }

    private beginProcessing(): DictationSession | null {
        const session = this.session
        if (this.machine.getCurrentState().kind !== 'recording' || !session) {
            return null
        }

        if (!session.captureStarted) {
            this.logInfo('錄音尚未開始即被停止，取消這次錄音')
            this.applyTransition(RecordingStates.idle())
            return null
        }

        if (!this.applyTransition(RecordingStates.processing())) {
            return null
        }
        session.elapsedMs = session.startedAt === null ? 0 : Date.now() - session.startedAt
        return session
    }

    private isActiveRecording(session: DictationSession): Promise<boolean> {
        return this.executor.run(() =>
            this.session === session && this.machine.getCurrentState().kind === 'recording'
        )
    }

    private applyAudioLevel(level: number): void {
        if (this.machine.getCurrentState().kind !== 'recording') {
            return
        }
        this.stateStore.setState({ audioLevel: Math.min(Math.max(level, 0), 1) })
    }

    private async completeInjection(outcome: InjectionOutcome, session: DictationSession): Promise<boolean> {
        this.events.emit('injected', outcome)

        if (outcome.kind === 'failed') {
            await this.recoverFromError(outcome.error, 'textInjection', session)
            return false
        }

        return this.executor.run(() => {
            if (this.session !== session) {
                return false
            }
            const completed = this.applyTransition(RecordingStates.success())
            if (completed) {
                this.stateStore.setState({ errorMessage: outcome.kind === 'clipboard' ? outcome.message : null })
            }
            return completed
        })
    }

    // ===== 內部：錯誤復原 =====

    private async recoverFromError(
        error: DictationError,
        operation: DictationOperation,
        session: DictationSession | null = null
    ): Promise<void> {
        const plan = await this.executor.run(() => this.applyRecoveryPlan(error, operation, session))
        if (!plan) {
            return
        }

        this.events.emit('recovery', { error, operation, action: plan.action })

        if (operation === 'recording' && session?.captureStarted && this.audioCapture.isRecording) {
            await this.releaseCapture()
        }

        await this.runRecoveryAction(plan, error, session)
    }

    private applyRecoveryPlan(
        error: DictationError,
        operation: DictationOperation,
        session: DictationSession | null
    ): RecoveryPlan | null {
        if (session && this.session !== session) {
            this.logWarning(`忽略已被取代的工作階段錯誤: ${describeDictationError(error)}`)
            return null
        }

        this.errorRecoveryAttempts++
        this.logger.error(
            `❌ [${this.serviceName}] ${operation} 失敗 (第 ${this.errorRecoveryAttempts} 次):`,
            describeDictationError(error)
        )

        const state = this.stateStore.getState()
        const plan = planRecovery(error, {
            operation,
            selectedModelId: state.selectedModelId,
            defaultModelId: this.config.defaultModelId,
            attempts: this.errorRecoveryAttempts,
            maxAttempts: this.config.maxErrorRecoveryAttempts,
            outsideActiveDictation: session === null && dictationSelectors.isBusy(state)
        })

        // 剪貼簿備援完成後才決定狀態
        if (plan.action.type === 'clipboardFallback') {
            return plan
        }

        if (plan.state) {
            this.applyTransition(plan.state)
        }
        this.stateStore.setState({ errorMessage: plan.errorMessage })
        return plan
    }

    private async runRecoveryAction(
        plan: RecoveryPlan,
        error: DictationError,
        session: DictationSession | null
    ): Promise<void> {
        const action = plan.action

        switch (action.type) {
            case 'none':
                return
            case 'showPermissionGuide':
                this.permissions.showPermissionGuide(action.permission)
                return
            case 'watchAudioDevice':
                this.watchingAudioDevice = true
                this.logInfo('等待音訊裝置重新連線')
                return
            case 'fallbackModel':
                this.logInfo(`改用預設模型 ${action.modelId}`)
                await this.loadModel(action.modelId, 'recovery')
                return
            case 'reloadModel':
                if (this.stateStore.getState().isLoadingModel) {
                    this.logInfo('模型載入中，等待目前的載入結果')
                    return
                }
                this.runInBackground('重新載入模型', () => this.loadModel(action.modelId, 'recovery'))
                return
            case 'clipboardFallback':
                await this.runClipboardFallback(error, session)
                return
        }
    }

    private async runClipboardFallback(error: DictationError, session: DictationSession | null): Promise<void> {
        // 只使用本次工作階段的文字，不沿用上一次的結果
        const text = session?.transcript
        if (!session || !text) {
            const description = describeDictationError(error)
            await this.executor.run(() => {
                this.applyTransition(RecordingStates.error(description))
                this.stateStore.setState({ errorMessage: description })
            })
            return
        }

        const outcome = await this.dispatcher.copyToClipboard(text, error)
        await this.completeInjection(outcome, session)
    }

    // ===== 內部：模型載入 =====

    private async ensureIdleForModelChange(): Promise<boolean> {
        const idle = await this.executor.run(() => this.machine.getCurrentState().kind === 'idle')
        if (!idle) {
            this.stateStore.setState({ errorMessage: MODEL_CHANGE_REFUSED_MESSAGE })
            this.logWarning(MODEL_CHANGE_REFUSED_MESSAGE)
        }
        return idle
    }

    private loadModel(modelId: string, origin: ModelLoadOrigin): Promise<boolean> {
        const load = this.performModelLoad(modelId, origin)
        this.modelLoadsInFlight.add(load)
        return load.finally(() => {
            this.modelLoadsInFlight.delete(load)
        })
    }

    private async performModelLoad(modelId: string, origin: ModelLoadOrigin): Promise<boolean> {
        if (origin !== 'user') {
            const busy = await this.executor.run(() => dictationSelectors.isBusy(this.stateStore.getState()))
            if (busy) {
                this.logWarning(`錄音或轉錄中，略過載入模型 ${modelId} (${origin})`)
                return false
            }
        }

        const outcome = await this.modelLoads.run(() => this.loadModelNow(modelId))
        if (!outcome.ok) {
            await this.recoverFromError(outcome.error, 'modelLoading')
            return false
        }
        return true
    }

    private async loadModelNow(modelId: string): Promise<Result<void, DictationError>> {
        this.logInfo(`載入模型 ${modelId}`)
        this.preferences.setSelectedModelId(modelId)
        this.stateStore.setState({
            selectedModelId: modelId,
            isLoadingModel: true,
            modelLoadingProgress: 0,
            modelLoadingStatus: `Loading model ${modelId}...`
        })

        try {
            if (!this.modelManager.isModelDownloaded(modelId)) {
                this.stateStore.setState({ modelLoadingStatus: 'Model needs to be downloaded', isReady: false })
                return err(DictationErrors.modelNotFound(modelId))
            }

            this.stateStore.setState({ modelLoadingProgress: 0.3 })
            const loaded = await settle(() => this.transcription.loadModel(modelId))
            if (!loaded.ok) {
                return err(asModelError(modelId, loaded.error))
            }

            this.stateStore.setState({
                modelLoadingProgress: 1,
                modelLoadingStatus: 'Model loaded successfully',
                errorMessage: null
            })
            this.logSuccess(`載入模型 ${modelId}`)
            return ok(undefined)
        } finally {
            this.stateStore.setState({ isLoadingModel: false, modelLoadingProgress: 0, modelLoadingStatus: null })
            this.updateReadyState()
        }
    }

    // ===== 內部：權限與就緒狀態 =====

    private async ensureMicrophonePermission(): Promise<boolean> {
        const audio = this.audioCapture
        const status = audio.checkMicrophonePermission()

        if (status === 'granted') {
            this.stateStore.setState({ hasMicrophonePermission: true })
            return true
        }

        let granted = false
        if (status === 'undetermined') {
            try {
                granted = await audio.requestMicrophonePermission()
            } catch (error) {
                this.logger.error(`❌ [${this.serviceName}] 請求麥克風權限失敗:`, error)
            }
        }

        this.stateStore.setState({ hasMicrophonePermission: granted })
        this.updateReadyState()
        return granted
    }

    private checkAllPermissions(): boolean {
        const microphone = this.audioCapture.checkMicrophonePermission() === 'granted'
        const accessibility = this.permissions.hasAccessibilityPermission()

        this.stateStore.setState({
            hasMicrophonePermission: microphone,
            hasAccessibilityPermission: accessibility
        })
        this.updateReadyState()
        return microphone
    }

    private updateReadyState(): void {
        const { hasMicrophonePermission, isReady } = this.stateStore.getState()
        const modelId = this.preferences.getSelectedModelId()
        const ready = hasMicrophonePermission
            && this.transcription.isModelLoaded
            && this.modelManager.isModelDownloaded(modelId)

        if (ready !== isReady) {
            this.stateStore.setState({ isReady: ready })
            this.logInfo(ready ? '聽寫已就緒' : '聽寫尚未就緒')
        }
    }

    // ===== 內部：訊號訂閱 =====

    private bindAudioCapture(): void {
        const audio = this.audioCapture
        this.audioSubscriptions = [
            audio.statusChanges.subscribe(status => {
                this.runInBackground('處理音訊狀態', () => this.handleAudioStatus(status))
            }),
            audio.audioLevels.subscribe(level => {
                this.runInBackground('更新音量', () => this.executor.run(() => this.applyAudioLevel(level)))
            }),
            audio.deviceChanges.subscribe(event => this.handleDeviceChange(event))
        ]
    }

    private unbindAudioCapture(): void {
        this.audioSubscriptions.forEach(unsubscribe => unsubscribe())
        this.audioSubscriptions = []
    }

    private bindPlatformSignals(): void {
        this.platformSubscriptions = [
            this.permissions.changes.subscribe(snapshot => {
                this.stateStore.setState({
                    hasMicrophonePermission: snapshot.microphone === 'granted',
                    hasAccessibilityPermission: snapshot.accessibility === 'granted'
                })
                this.updateReadyState()
            }),
            this.modelManager.installedModelsChanged.subscribe(() => this.updateReadyState())
        ]
    }

    private async handleAudioStatus(status: AudioCaptureStatus): Promise<void> {
        const { kind, session } = await this.executor.run(() => ({
            kind: this.machine.getCurrentState().kind,
            session: this.session
        }))

        // 只在擷取進行中的錄音階段處理，其餘為資訊性通知
        if (kind !== 'recording' || !session?.captureStarted) {
            return
        }

        if (status.kind === 'error') {
            await this.recoverFromError(status.error, 'recording', session)
        } else if (status.kind === 'idle') {
            this.logWarning('音訊擷取自行停止，直接轉錄目前內容')
            await this.stopDictation()
        }
    }

    private handleDeviceChange(event: AudioDeviceEvent): void {
        this.stateStore.setState({ currentAudioDevice: event.kind === 'connected' ? event.deviceName : null })

        if (event.kind !== 'connected' || !this.watchingAudioDevice) {
            return
        }

        this.runInBackground('音訊裝置重新連線', () => this.executor.run(() => {
            this.watchingAudioDevice = false
            if (this.machine.getCurrentState().kind !== 'error') {
                return
            }
            if (this.applyTransition(RecordingStates.idle())) {
                this.stateStore.setState({ errorMessage: DEVICE_RECONNECTED_MESSAGE })
                this.logSuccess('音訊裝置重新連線', event.deviceName)
            }
        }))
    }

    private registerHotkey(): boolean {
        const combo = this.preferences.getHotkey()
        const result = this.hotkeys.registerPushToTalk(
            PUSH_TO_TALK_HOTKEY_ID,
            combo,
            () => this.runInBackground('快捷鍵按下', () => this.handleHotkeyPress()),
            () => this.runInBackground('快捷鍵放開', () => this.handleHotkeyRelease())
        )

        if (!result.ok) {
            this.hotkeyRegistered = false
            this.stateStore.setState({ errorMessage: `Failed to register hotkey: ${describeHotkeyError(result.error)}` })
            this.logWarning(`註冊快捷鍵 ${combo} 失敗`, result.error)
            if (result.error.kind === 'accessibilityPermissionRequired') {
                this.permissions.showPermissionGuide('accessibility')
            }
            return false
        }

        this.hotkeyRegistered = true
        this.logSuccess(`註冊快捷鍵 ${combo} (${this.config.hotkeyMode})`)
        return true
    }

    // ===== 內部：計時器 =====

    private startRecordingTimers(session: DictationSession): void {
        this.clearRecordingTimers()

        const version = this.machine.getVersion()
        const maxDurationMs = this.preferences.getMaxRecordingDurationMs()
        const startedAt = session.startedAt ?? Date.now()

        this.progressTimer = setInterval(() => {
            const elapsed = Date.now() - startedAt
            this.stateStore.setState({ recordingProgress: Math.min(elapsed / maxDurationMs, 1) })
        }, this.config.progressTickMs)

        this.autoStopTimer = setTimeout(() => {
            this.autoStopTimer = null
            this.runInBackground('自動停止錄音', async () => {
                const current = await this.executor.run(() =>
                    this.machine.getVersion() === version && this.session === session
                )
                if (!current) {
                    return
                }
                this.logInfo(`錄音達到上限 ${formatDurationMs(maxDurationMs)}，自動停止`)
                await this.stopDictation()
            })
        }, maxDurationMs)
    }

    private clearRecordingTimers(): void {
        if (this.progressTimer) {
            clearInterval(this.progressTimer)
            this.progressTimer = null
        }
        if (this.autoStopTimer) {
            clearTimeout(this.autoStopTimer)
            this.autoStopTimer = null
        }
    }

    /**
     * 延遲回到 idle；期間若有其他轉換則不執行
     */
    private scheduleRevertToIdle(delayMs: number): void {
        this.clearRevertTimer()
        const version = this.machine.getVersion()

        this.revertTimer = setTimeout(() => {
            this.revertTimer = null
            this.runInBackground('自動回到 idle', () => this.executor.run(() => {
                if (this.machine.getVersion() !== version) {
                    return
                }
                this.applyTransition(RecordingStates.idle())
            }))
        }, delayMs)
    }

    private clearRevertTimer(): void {
        if (this.revertTimer) {
            clearTimeout(this.revertTimer)
            this.revertTimer = null
        }
    }

    private startHealthMonitoring(): void {
        this.stopHealthMonitoring()
        this.healthCheckTimer = setInterval(() => {
            this.runInBackground('健康檢查', () => this.checkComponentHealth())
        }, this.config.healthCheckIntervalMs)
    }

    private stopHealthMonitoring(): void {
        if (this.healthCheckTimer) {
            clearInterval(this.healthCheckTimer)
            this.healthCheckTimer = null
        }
    }

    // ===== 內部：工具 =====

    private async releaseCapture(): Promise<void> {
        try {
            await this.audioCapture.stopRecording()
        } catch (error) {
            this.logger.error(`❌ [${this.serviceName}] 釋放音訊擷取失敗:`, error)
        }
    }

    /**
     * 由回呼觸發的非同步工作，錯誤只記錄
     */
    private runInBackground(label: string, task: () => Promise<unknown>): void {
        task().catch(error => {
            this.logger.error(`❌ [${this.serviceName}] ${label} 失敗:`, error)
        })
    }
}

/**
 * 轉錄服務回報的非模型錯誤，統一包成 modelLoadingFailed
 */
function asModelError(modelId: string, error: DictationError): DictationError {
    switch (error.kind) {
        case 'modelNotFound':
        case 'modelLoadingFailed':
        case 'networkUnavailable':
            return error
        default:
            return DictationErrors.modelLoadingFailed(modelId, describeDictationError(error))
    }
}
